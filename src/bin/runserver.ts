import bole from 'bole'
import isDev from 'are-we-dev'
import http from 'http'
import type { IncomingMessage, ServerResponse } from 'http'

import { buildMiddleware, handler } from '../core/middleware'
import type { Handler, MiddlewareConfig } from '../core/middleware'
import { HEADERS, STATUS, THREW } from '../core/prelude'
import { _isPipeable, _readMetadata } from '../core/utils'
import { route } from '../middleware/route'
import { Context } from '../data/context'

interface ServerOptions {
  middleware?: MiddlewareConfig[] | Promise<MiddlewareConfig[]>
  handlers?: Record<string, Handler> | Promise<Record<string, Handler>>
}

interface Listener {
  (req: IncomingMessage, res: ServerResponse): void
}

function serializeError (error: Error): Record<string, unknown> {
  const { message, stack, ...rest } = error
  return {
    ...rest,
    message,
    ...(isDev() ? { stack } : {}),
  }
}

/**
 * Compose `middleware` around the router for `handlers` and return the
 * `request` listener for a node http server. The router runs first so
 * middleware can see `context.params` and `context.handler`.
 */
async function buildListener ({
  middleware = [],
  handlers = {},
}: ServerOptions = {}, isClosing: () => boolean = () => false): Promise<Listener> {
  const [resolvedMiddleware, resolvedHandlers] = await Promise.all([middleware, handlers])
  const respond = await buildMiddleware([[route, resolvedHandlers], ...resolvedMiddleware], handler)
  const logger = bole('autopage:server')

  async function onrequest (req: IncomingMessage, res: ServerResponse) {
    const context = new Context(req, res)
    const result = await respond(context)
    const { [STATUS]: status = 200, [HEADERS]: headers = {}, [THREW]: threw } = _readMetadata(result)

    headers['x-clacks-overhead'] = 'GNU/Terry Pratchett'
    if (isClosing()) {
      headers.connection = 'close'
    }

    res.writeHead(status, headers)
    if (_isPipeable(result)) {
      result.pipe(res)
    } else if (Buffer.isBuffer(result)) {
      res.end(result)
    } else if (threw && result instanceof Error) {
      res.end(JSON.stringify(serializeError(result)))
    } else if (result) {
      res.end(JSON.stringify(result))
    } else {
      res.end()
    }
  }

  return (req: IncomingMessage, res: ServerResponse) => {
    onrequest(req, res).catch((err: unknown) => {
      logger.error(err)
      if (!res.headersSent) {
        res.writeHead(500, { 'content-type': 'text/plain; charset=utf-8' })
      }
      res.end()
    })
  }
}

async function runserver (options: ServerOptions = {}): Promise<http.Server> {
  const server = http.createServer()
  let isClosing = false

  // When we're not in dev, handle SIGINT gracefully. Gracefully let open
  // connections complete, but let them know not to keep-alive!
  if (!isDev()) {
    process.on('SIGINT', () => {
      if (isClosing) {
        process.exit(1)
      }
      const logger = bole('autopage:server')
      logger.info('Caught SIGINT, preparing to shutdown. If running on the command line another ^C will close the app immediately.')
      isClosing = true
      server.close()
    })
  }

  server.on('request', await buildListener(options, () => isClosing))
  return server
}

export { buildListener, runserver }
export type { Listener, ServerOptions }
