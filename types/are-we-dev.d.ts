declare module 'are-we-dev' {
  function isDev(): boolean
  export = isDev
}
