import bistre from 'bistre'
import bole from 'bole'
import isDev from 'are-we-dev'
import type { Writable } from 'stream'

import { serviceName, STATUS, THREW } from '../core/prelude'
import type { Handler } from '../core/middleware'
import { _readMetadata } from '../core/utils'
import type { Context } from '../data/context'

interface LogOptions {
  logger?: bole.Logger
  level?: string
  stream?: Writable
}

function log ({
  logger = bole(serviceName),
  level = process.env.LOG_LEVEL || 'debug',
  stream = process.stdout,
}: LogOptions = {}) {
  if (isDev()) {
    const pretty = bistre({ time: true })
    pretty.pipe(stream)
    stream = pretty
  }
  bole.output({ level, stream })

  return function logMiddleware (next: Handler): Handler {
    return async function inner (context: Context) {
      const result = await next(context)
      const { [STATUS]: status, [THREW]: threw } = _readMetadata(result)

      if (threw && result instanceof Error && result.stack) {
        logger.error(result)
      }

      logger.info({
        message: `${status} ${context.request.method} ${context.request.url}`,
        id: context.id,
        ip: context.remote,
        host: context.host,
        method: context.request.method,
        url: context.request.url,
        elapsed: Date.now() - context.start,
        status,
        userAgent: context.request.headers['user-agent'],
        referer: context.request.headers.referer,
      })

      return result
    }
  }
}

export { log }
export type { LogOptions }
