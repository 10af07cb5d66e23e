import path from 'path'

import { NunjucksEngine, TEMPLATE, page, template } from '../../src'
import type { Context, Handler, MiddlewareConfig, Response } from '../../src'

interface State {
  name: string
}

interface App {
  engine: NunjucksEngine
  middleware: MiddlewareConfig[]
  handlers: Record<string, Handler>
}

/**
 * A small site whose pages live in `templates/pages`: every request for
 * `/`, `/about` or `/docs` is answered by the page middleware, with a navbar
 * showing the current user. `/complex` is a regular route that reuses the same
 * context builder.
 */
function createApp (state: State = { name: 'User Name' }): App {
  const engine = new NunjucksEngine({ paths: [path.join(__dirname, 'templates')] })

  async function baseContext (_context: Context) {
    return { username: state.name }
  }

  const complexPage: Handler = async (context: Context): Promise<Response> => {
    return {
      [TEMPLATE]: 'complex-page.html',
      ...await baseContext(context),
      sections: ['Routing', 'Context builders', 'Error pages'],
    }
  }
  complexPage.route = 'GET /complex'

  return {
    engine,
    middleware: [
      [template, { engine }],
      [page, { engine, prefix: 'pages', context: baseContext }],
    ],
    handlers: { complexPage },
  }
}

export { createApp }
export type { App, State }
