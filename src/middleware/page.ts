import bole from 'bole'

import { normalizePrefix, requestPath, templateCandidates, trimPath } from '../core/candidates'
import { isTemplateEngine } from '../core/engine'
import type { RenderContext, TemplateEngine } from '../core/engine'
import type { Handler } from '../core/middleware'
import { HEADERS, STATUS } from '../core/prelude'
import type { Context } from '../data/context'
import { TemplateConfigurationError, TemplateRenderError } from '../data/errors'

interface ContextBuilder {
  (context: Context): RenderContext | Promise<RenderContext>
}

interface PageOptions {
  engine?: TemplateEngine
  prefix?: string
  context?: ContextBuilder
  logger?: bole.Logger
}

const emptyContext: ContextBuilder = () => ({})

/**
 * Serve GET requests straight from templates when the request path names
 * one, without registering a route per page.
 *
 * For `/about` under the prefix `pages`, `pages/about.html` and
 * `pages/about/index.html` are checked; `/` checks `pages/index.html`. When
 * both `about` candidates exist the directory index is used. On a match the
 * `context` builder is awaited with the request context and the template is
 * rendered with whatever it returns; the rest of the middleware chain does not
 * run. Anything else (other methods, unknown paths) passes through untouched.
 *
 * ```js
 * const engine = new NunjucksEngine({ paths: ['templates'] })
 * const middleware = [
 *   [page, { engine, prefix: 'pages', context: async (ctx) => ({ user: await lookup(ctx) }) }],
 * ]
 * ```
 *
 * Throws `TemplateConfigurationError` while the middleware chain is built if
 * `engine` is missing. A template that fails to render produces a 500.
 */
function page ({
  engine,
  prefix = '',
  context: buildContext = emptyContext,
  logger = bole('autopage:page'),
}: PageOptions = {}) {
  if (!isTemplateEngine(engine)) {
    throw new TemplateConfigurationError('page')
  }
  const templates: TemplateEngine = engine
  const templatePrefix = normalizePrefix(prefix)

  return function pageMiddleware (next: Handler): Handler {
    return async function page (context: Context) {
      // handlers of every method may render through context.templates
      context.templates = context.templates || templates

      if (context.method !== 'GET') {
        return next(context)
      }

      const pathname = requestPath(context.request.url || '/')
      if (pathname === undefined) {
        return next(context)
      }

      const candidates = templateCandidates(trimPath(pathname), templatePrefix)
      logger.debug(`Checking template candidates: ${candidates.join(', ')}`)

      const registered = templates.templateNames()
      let matched: string | undefined
      for (const candidate of candidates) {
        // later candidates win: a directory index beats a same-named file
        if (registered.has(candidate)) {
          matched = candidate
        }
      }

      if (matched === undefined) {
        logger.debug('No matching template for path.')
        return next(context)
      }

      logger.debug(`Matched path to template: ${matched}`)
      const renderContext = await buildContext(context)

      let rendered: string
      try {
        rendered = templates.render(matched, renderContext)
      } catch (err) {
        throw new TemplateRenderError(matched, err)
      }

      return Object.assign(Buffer.from(rendered, 'utf8'), {
        [STATUS]: 200,
        [HEADERS]: { 'content-type': 'text/html; charset=utf-8' },
      })
    }
  }
}

export { page }
export type { ContextBuilder, PageOptions }
