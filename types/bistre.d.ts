declare module 'bistre' {
  import { Transform } from 'stream'

  function bistre(options?: { time?: boolean }): Transform
  export = bistre
}
