import { IncomingMessage, ServerResponse } from 'http'
import { URL } from 'url'
import * as uuid from 'uuid'

import type { TemplateEngine } from '../core/engine'
import type { Handler, Response } from '../core/middleware'
import { NoMatchError } from './errors'

class Context {
  private _query?: Record<string, string>
  private _parsedUrl?: URL

  /** Unique per request: taken from `x-request-id` or `traceparent`, or generated. */
  public id: string

  /** Milliseconds since the epoch at which the request was received. */
  public start: number

  public remote: string
  public host: string

  /** Route parameters filled in by the router. */
  public params: Record<string, string | undefined>

  /** The route handler selected by the router for this request. */
  public handler: Handler = Context.baseHandler

  /**
   * The template engine used by the page and template middleware. Set by
   * whichever of them runs first, so handlers can render templates directly.
   */
  public templates?: TemplateEngine

  constructor (public request: IncomingMessage, public _response: ServerResponse) {
    this.start = Date.now()
    this.remote = request.socket
      ? (request.socket.remoteAddress || '').replace('::ffff:', '')
      : ''
    const [host] = (request.headers.host || '').split(':')
    this.host = host
    this.params = {}

    const id = request.headers['x-request-id'] || request.headers.traceparent
    this.id = id ? String(id) : uuid.v4()
  }

  static baseHandler (context: Context): Response {
    throw new NoMatchError(context.method, context.url.pathname)
  }

  get method (): string {
    return this.request.method || 'GET'
  }

  get headers (): IncomingMessage['headers'] {
    return this.request.headers
  }

  get url (): URL {
    if (this._parsedUrl) {
      return this._parsedUrl
    }
    this._parsedUrl = new URL(String(this.request.url), `http://${this.headers.host || 'example.com'}`)
    return this._parsedUrl
  }

  set url (value: URL) {
    this._query = undefined
    this._parsedUrl = value
    this.request.url = value.pathname + value.search
  }

  get query (): Record<string, string> {
    this._query = this._query || Object.fromEntries(this.url.searchParams)
    return this._query
  }
}

export { Context }
