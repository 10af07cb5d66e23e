import { inject } from '@hapi/shot'
import type { IncomingMessage, ServerResponse } from 'http'
import type tap from 'tap'

import { buildListener } from '../bin/runserver'
import type { Listener } from '../bin/runserver'
import type { Handler, MiddlewareConfig } from '../core/middleware'

type Test = (typeof tap.Test)['prototype']
type ShotRequestOptions = Exclude<Parameters<typeof inject>[1], string>
type ShotResponse = Awaited<ReturnType<typeof inject>>
type ShotListener = Parameters<typeof inject>[0]
type TestRequestOptions = Partial<ShotRequestOptions> & { body?: string | Buffer | Record<string, unknown> }
type TestResponse = ShotResponse & { json(): unknown }

type PageTest = Test & {
  request(opts?: TestRequestOptions): Promise<TestResponse>
}

/**
 * Adapt a request listener for `inject()`. shot's injected request behaves as
 * an `IncomingMessage` but is not typed as one.
 */
function injectable (listener: Listener): ShotListener {
  return (req: unknown, res: unknown) => listener(<IncomingMessage>req, <ServerResponse>res)
}

/**
 * Wrap a tap test so it receives `t.request()`, which injects a request into
 * an in-process instance of the app built from `middleware` and `handlers`.
 *
 * ```js
 * const _ = test({ middleware: [[page, { engine }]] })
 * tap.test('renders the about page', _(async (t) => {
 *   const response = await t.request({ url: '/about' })
 *   t.equal(response.statusCode, 200)
 * }))
 * ```
 */
function test ({
  middleware = [],
  handlers = {},
}: {
  middleware?: MiddlewareConfig[] | Promise<MiddlewareConfig[]>
  handlers?: Record<string, Handler> | Promise<Record<string, Handler>>
} = {}) {
  return (inner: (t: PageTest) => Promise<unknown> | unknown) => {
    return async (outerAssert: Test) => {
      const onrequest = await buildListener({ middleware, handlers })

      const request = async ({
        method = 'GET',
        url = '/',
        headers = {},
        body,
        payload,
        ...opts
      }: TestRequestOptions = {}): Promise<TestResponse> => {
        headers = { ...headers }
        let data = payload || body
        if (!Buffer.isBuffer(data) && typeof data !== 'string' && data) {
          data = JSON.stringify(data)
          headers['content-type'] = 'application/json'
        }

        const response = await inject(injectable(onrequest), {
          method,
          url,
          headers,
          payload: data,
          ...opts,
        })

        return Object.assign(response, {
          json: (): unknown => JSON.parse(response.payload),
        })
      }

      await inner(Object.assign(outerAssert, { request }))
    }
  }
}

export { injectable, test }
export type { PageTest, Test, TestRequestOptions, TestResponse }
