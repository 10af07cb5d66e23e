import type { HTTPMethod } from 'find-my-way'

import { enforceInvariants } from '../middleware/enforce-invariants'
import type { Context } from '../data/context'
import type { HttpMetadata } from './prelude'

type Response = (
  void |
  null |
  string |
  number |
  boolean |
  object
)

// What enforceInvariants() hands back: always an object (a Buffer, stream,
// error or plain object) carrying its status and headers.
type InternalResponse = object & HttpMetadata

interface Handler {
  (context: Context): Response | Promise<Response>
  method?: HTTPMethod[] | HTTPMethod
  route?: string
  middleware?: MiddlewareConfig[]
}

interface Adaptor {
  (next: Handler): Handler | Promise<Handler>
}

// Declared through a method so middleware taking differently-shaped options
// can share one list: method parameters are compared bivariantly.
type Middleware = {
  bivarianceHack (...args: unknown[]): Adaptor
}['bivarianceHack']

type MiddlewareConfig = Middleware | [Middleware, ...unknown[]]

async function buildMiddleware (middleware: MiddlewareConfig[], router: Handler): Promise<Handler> {
  const result = middleware.reduce((lhs: Adaptor[], rhs: MiddlewareConfig) => {
    const [mw, ...args] = Array.isArray(rhs) ? rhs : [rhs]
    return [...lhs, enforceInvariants(), mw(...args)]
  }, []).concat(enforceInvariants())

  return result.reduceRight(async (lhs: Promise<Handler>, rhs: Adaptor): Promise<Handler> => {
    return rhs(await lhs)
  }, Promise.resolve(router))
}

function handler (context: Context): Response | Promise<Response> {
  return context.handler(context)
}

export { buildMiddleware, handler }
export type { Adaptor, Handler, InternalResponse, Middleware, MiddlewareConfig, Response }
