import { STATUS } from '../core/prelude'

class NoMatchError extends Error {
  [STATUS]: number
  public __noMatch: boolean = true

  constructor (method: string, pathname: string) {
    super(`Could not find route for ${method} ${pathname}`)
    this.name = 'NoMatchError'
    this[STATUS] = 404
    Error.captureStackTrace(this, NoMatchError)
  }
}

/**
 * Raised while the middleware chain is built when a template middleware was
 * not given a usable template engine. This is a wiring bug: `runserver()`
 * rejects and nothing is served.
 */
class TemplateConfigurationError extends Error {
  constructor (middlewareName: string) {
    super(`${middlewareName}() requires a template engine: pass one as the \`engine\` option`)
    this.name = 'TemplateConfigurationError'
  }
}

/**
 * A matched template failed to render. Carries a 500 status so the request
 * fails without taking down the server.
 */
class TemplateRenderError extends Error {
  [STATUS]: number
  public template: string

  constructor (template: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Could not render template ${template}: ${reason}`, { cause })
    this.name = 'TemplateRenderError'
    this.template = template
    this[STATUS] = 500
  }
}

export { NoMatchError, TemplateConfigurationError, TemplateRenderError }
