import bole from 'bole'
import isDev from 'are-we-dev'
import { Environment, Template } from 'nunjucks'
import * as uuid from 'uuid'

import { isTemplateEngine } from '../core/engine'
import type { RenderContext, TemplateEngine } from '../core/engine'
import type { Handler } from '../core/middleware'
import { HEADERS, STATUS, TEMPLATE, THREW } from '../core/prelude'
import type { Headers } from '../core/prelude'
import { _readMetadata } from '../core/utils'
import type { Context } from '../data/context'
import { TemplateConfigurationError } from '../data/errors'

interface TemplateOptions {
  engine?: TemplateEngine
  logger?: bole.Logger
}

const devErrorTemplateSource = `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <title>{% if renderError %}{{ renderError.name }}: {{ renderError.message }}{% else %}{{ response.name }}: {{ response.message }}{% endif %}</title>
  </head>
  <body>
    <header>
      <h1>{% if status %}<code>{{ status }}</code> {% endif %}{{ response.name or renderError.name }} at {{ context.url.pathname }}</h1>
      <h2>{{ response.message or renderError.message }}</h2>
      <table>
        <tr><td>Request Method</td><td><code>{{ context.method }}</code></td></tr>
        <tr><td>Request URL</td><td><code>{{ context.url }}</code></td></tr>
        {% if template %}<tr><td>Template</td><td><code>{{ template }}</code></td></tr>{% endif %}
      </table>
      <aside>
        You're seeing this page because you are in dev mode.{% if context.method == "GET" %}
        <a href="?__production=1">Click here</a> to see the production version of this error, or{% endif %}
        set the <code>NODE_ENV</code> environment variable to <code>production</code> and restart the server.
      </aside>
    </header>
    <section id="stacktrace">
      {% if response.stack %}<pre><code>{{ response.stack }}</code></pre>{% endif %}
      {% if renderError %}
      <h3>Caught error rendering <code>{{ template }}</code></h3>
      <pre><code>{{ renderError.stack }}</code></pre>
      {% endif %}
    </section>
  </body>
</html>
`

function errorTemplateName (status: number) {
  return `${String(status - (status % 100)).replace(/0/g, 'x')}.html`
}

function fallbackPage (correlation: string) {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title></title>
</head>
<body>
  <h1>An unexpected server error occurred (ref: <code>${correlation}</code>).</h1>
</body>
</html>`
}

/**
 * Render handler responses that name a template. A handler returning
 * `{ [Symbol.for('template')]: 'profile.html', user }` gets `profile.html`
 * rendered with `{ user }`.
 *
 * Thrown errors are rendered as HTML for browser-ish clients: a debug page in
 * development, `5xx.html` or `4xx.html` from the engine in production.
 */
function template ({
  engine,
  logger = bole('autopage:templates'),
}: TemplateOptions = {}) {
  if (!isTemplateEngine(engine)) {
    throw new TemplateConfigurationError('template')
  }
  const templates: TemplateEngine = engine
  const devErrorTemplate = new Template(devErrorTemplateSource, new Environment(null, { autoescape: true }))

  const render = (target: string | Template, context: RenderContext) => (
    typeof target === 'string'
    ? templates.render(target, context)
    : target.render(context)
  )

  return function templateMiddleware (next: Handler): Handler {
    return async function template (context: Context) {
      context.templates = context.templates || templates
      const response = await next(context)
      const meta = _readMetadata(response)
      const name = meta[TEMPLATE]
      const threw = meta[THREW]
      const headers: Headers = meta[HEADERS] ?? {}
      let status = meta[STATUS] ?? 200

      if (typeof response !== 'object' || response === null || (!name && !threw)) {
        return response
      }

      let target: string | Template = name || devErrorTemplate
      let ctxt: RenderContext = Object.fromEntries(Object.entries(response))
      let renderingErrorTemplate = false
      if (threw && !name) {
        // If you threw and didn't have a template set, we have to guess at
        // whether this response is meant for consumption by a browser or
        // some other client.
        const maybeJSON = (
          context.headers['sec-fetch-dest'] === 'none' ||
          'x-requested-with' in context.headers ||
          (context.headers['content-type'] || '').includes('application/json')
        )

        if (maybeJSON) {
          return response
        }

        headers['content-type'] = 'text/html; charset=utf-8'
        const useDebug = isDev() && !('__production' in context.query)
        target = useDebug ? devErrorTemplate : errorTemplateName(status)
        renderingErrorTemplate = true
        ctxt = {
          context,
          response,
          template: name,
          renderError: null,
          status,
        }
      }

      let rendered: string
      try {
        rendered = render(target, ctxt)
      } catch (err) {
        status = _readMetadata(err)[STATUS] ?? 500
        const fallback = !renderingErrorTemplate && isDev() ? devErrorTemplate : '5xx.html'

        try {
          rendered = render(fallback, {
            context,
            response: threw ? response : null,
            template: typeof target === 'string' ? target : null,
            renderError: err,
            status,
          })
        } catch (fallbackErr) {
          const correlation = uuid.v4()
          if (threw && response instanceof Error) {
            logger.error(`[${correlation} 1/2] Caught error rendering 5xx.html for original error: ${response.stack}`)
          }
          const stack = fallbackErr instanceof Error ? fallbackErr.stack : String(fallbackErr)
          logger.error(`[${correlation} ${threw ? '2/2' : '1/1'}] Caught template error while rendering 5xx.html: ${stack}`)
          rendered = fallbackPage(correlation)
        }
      }

      headers['content-type'] = headers['content-type'] || 'text/html; charset=utf-8'
      // NB: This removes "THREW" because the template layer is handling the error.
      return Object.assign(Buffer.from(rendered, 'utf8'), {
        [STATUS]: status,
        [HEADERS]: headers,
      })
    }
  }
}

/**
 * Add values to the render context of every response that names a template.
 * Function values are called with the request context and awaited.
 */
function templateContext (extraContext: Record<string, unknown> = {}) {
  return (next: Handler): Handler => {
    return async (context: Context) => {
      const result = await next(context)

      if (typeof result === 'object' && result !== null && _readMetadata(result)[TEMPLATE]) {
        const additions: RenderContext = {
          STATIC_URL: process.env.STATIC_URL || '/static',
        }

        for (const [key, fn] of Object.entries(extraContext)) {
          additions[key] = typeof fn === 'function' ? await fn(context) : fn
        }
        Object.assign(result, additions)
      }

      return result
    }
  }
}

export { template, templateContext }
export type { TemplateOptions }
