import type bole from 'bole'
import { IncomingMessage, ServerResponse } from 'http'
import { Socket } from 'net'

import { Context } from '../src/data/context'
import type { Test } from '../src/middleware/test'

type LogLine = [string, unknown[]]

// A bole logger that records what it is given instead of writing it.
function stubLogger (lines: LogLine[]): bole.Logger {
  const logger = (_name: string) => stubLogger(lines)
  return Object.assign(logger, {
    debug: (...args: unknown[]) => { lines.push(['debug', args]) },
    info: (...args: unknown[]) => { lines.push(['info', args]) },
    warn: (...args: unknown[]) => { lines.push(['warn', args]) },
    error: (...args: unknown[]) => { lines.push(['error', args]) },
  })
}

// A request context for calling a middleware directly, without a server.
function fakeContext (method: string, url: string) {
  const request = new IncomingMessage(new Socket())
  request.method = method
  request.url = url
  request.headers = { host: 'localhost:5000', 'user-agent': 'tap' }
  return new Context(request, new ServerResponse(request))
}

function setNodeEnv (assert: Test, value: string) {
  const previous = process.env.NODE_ENV
  process.env.NODE_ENV = value
  assert.teardown(() => {
    if (previous === undefined) {
      delete process.env.NODE_ENV
    } else {
      process.env.NODE_ENV = previous
    }
  })
}

export { fakeContext, setNodeEnv, stubLogger }
export type { LogLine }
