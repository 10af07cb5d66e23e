import fmw from 'find-my-way'
import type { HTTPMethod } from 'find-my-way'
import { METHODS } from 'http'

import { buildMiddleware } from '../core/middleware'
import type { Handler } from '../core/middleware'
import type { Context } from '../data/context'

function isHTTPMethod (method: string): method is HTTPMethod {
  return METHODS.includes(method)
}

function parseRoute (handler: Handler): [HTTPMethod[], string] {
  const [methodPart, ...routeParts] = String(handler.route).split(' ')
  const route = routeParts.length ? routeParts.join(' ') : methodPart
  const declared: string[] = routeParts.length ? [methodPart] : [handler.method || 'GET'].flat()
  const methods = declared.map(xs => xs.toUpperCase())

  for (const method of methods) {
    if (!isHTTPMethod(method)) {
      throw new TypeError(`Unknown HTTP method "${method}" in route "${handler.route}"`)
    }
  }
  return [methods.filter(isHTTPMethod), route]
}

/**
 * Route requests to `handlers` by their `route` property, written either as
 * `'METHOD /path'` or as a bare path with the methods in `handler.method`
 * (GET when unset). Matching sets `context.handler` and `context.params`; the
 * handler runs at the bottom of the middleware chain.
 */
function route (handlers: Record<string, Handler> = {}) {
  const wayfinder = fmw()
  const registry = new Map<string, Handler>()

  return async (next: Handler): Promise<Handler> => {
    for (const [key, original] of Object.entries(handlers)) {
      if (typeof original.route !== 'string') {
        continue
      }

      const [methods, path] = parseRoute(original)
      let handler = original
      if (Array.isArray(original.middleware)) {
        handler = await buildMiddleware(original.middleware, original)
        // preserve the original name, please
        Object.defineProperty(handler, 'name', { value: original.name })
      }

      registry.set(key, handler)
      wayfinder.on(methods, path, {}, () => {}, key)
    }

    return (context: Context) => {
      const method = context.method
      const match = isHTTPMethod(method) ? wayfinder.find(method, context.url.pathname) : null
      const key: unknown = match ? match.store : undefined
      const handler = typeof key === 'string' ? registry.get(key) : undefined

      if (!match || !handler) {
        return next(context)
      }

      context.params = match.params
      context.handler = handler

      return next(context)
    }
  }
}

export { route }
