import { STATUS, HEADERS, TEMPLATE, THREW } from '../core/prelude'
import type { Headers } from '../core/prelude'
import type { Handler, InternalResponse } from '../core/middleware'
import { _isPipeable, _readMetadata } from '../core/utils'
import type { Context } from '../data/context'

function enforceInvariants () {
  return function invariantMiddleware (next: Handler): Handler {
    return async function invariant (context: Context): Promise<InternalResponse> {
      let error: Error | undefined
      let result: unknown

      try {
        result = await next(context)
      } catch (err) {
        error = err instanceof Error ? err : new Error(String(err))
      }

      const body = error || result || ''
      const isPipe = _isPipeable(body)
      const meta = _readMetadata(body)

      const status = meta[STATUS] ?? (error ? 500 : result ? 200 : 204)
      const headers: Headers = meta[HEADERS] ?? {}

      if (!headers['content-type']) {
        if (typeof body === 'string') {
          headers['content-type'] = 'text/plain; charset=utf-8'
        } else if (isPipe) {
          headers['content-type'] = 'application/octet-stream'
        } else if (meta[TEMPLATE]) {
          headers['content-type'] = 'text/html; charset=utf-8'
        } else {
          headers['content-type'] = 'application/json; charset=utf-8'
        }
      }

      if (error) {
        return Object.assign(error, {
          [STATUS]: status,
          [HEADERS]: headers,
          [THREW]: true,
        })
      }

      if (result && typeof result === 'object') {
        return Object.assign(result, {
          [STATUS]: status,
          [HEADERS]: headers,
        })
      }

      return Object.assign(Buffer.from(result ? String(result) : '', 'utf8'), {
        [STATUS]: status,
        [HEADERS]: headers,
      })
    }
  }
}

export { enforceInvariants }
