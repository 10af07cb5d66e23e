/**
 * Strip every leading and trailing `/` from a template prefix, so
 * `'/pages/'`, `'pages/'` and `'pages'` all name the same directory.
 */
function normalizePrefix (prefix: string): string {
  return prefix.replace(/^\/+|\/+$/g, '')
}

/**
 * The pathname of a raw request target, with dot segments resolved. The target
 * is read as a path only: `//about` stays `//about` rather than naming a host.
 * Targets that are not paths (`*`, absolute URLs) have none.
 */
function requestPath (target: string): string | undefined {
  if (!target.startsWith('/')) {
    return undefined
  }
  return new URL(`http://localhost${target}`).pathname
}

// Drops the one leading `/` every pathname has, and any trailing ones.
function trimPath (pathname: string): string {
  return pathname.replace(/^\//, '').replace(/\/+$/, '')
}

/**
 * Map a request path onto the template names that could serve it, in the
 * order they are checked. `path` and `prefix` are expected to be trimmed.
 *
 *   templateCandidates('about', 'pages') // ['pages/about.html', 'pages/about/index.html']
 *   templateCandidates('', 'pages')      // ['pages/index.html']
 *   templateCandidates('about', '')      // ['about.html', 'about/index.html']
 *
 * The path is used as-is: no percent-decoding, no `..` handling. Callers pass
 * the result of `requestPath()`, which has already had dot segments resolved.
 */
function templateCandidates (path: string, prefix: string): string[] {
  const base = prefix ? `${prefix}/` : ''
  if (!path) {
    return [`${base}index.html`]
  }

  return [
    `${base}${path}.html`,
    `${base}${path}/index.html`,
  ]
}

export { normalizePrefix, requestPath, templateCandidates, trimPath }
