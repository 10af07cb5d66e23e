import { buildListener, runserver } from './bin/runserver'
import { normalizePrefix, requestPath, templateCandidates, trimPath } from './core/candidates'
import { NunjucksEngine, isTemplateEngine } from './core/engine'
import { buildMiddleware } from './core/middleware'
import { HEADERS, STATUS, TEMPLATE, THREW } from './core/prelude'
import { Context } from './data/context'
import { NoMatchError, TemplateConfigurationError, TemplateRenderError } from './data/errors'
import { enforceInvariants } from './middleware/enforce-invariants'
import { log } from './middleware/log'
import { page } from './middleware/page'
import { route } from './middleware/route'
import { template, templateContext } from './middleware/template'

const middleware = {
  log,
  page,
  route,
  template,
  templateContext,
  enforceInvariants,
}

export {
  Context,
  HEADERS,
  NoMatchError,
  NunjucksEngine,
  STATUS,
  TEMPLATE,
  THREW,
  TemplateConfigurationError,
  TemplateRenderError,
  buildListener,
  buildMiddleware,
  isTemplateEngine,
  runserver as main,
  middleware,
  normalizePrefix,
  page,
  requestPath,
  runserver,
  template,
  templateCandidates,
  trimPath,
}

export type { Adaptor, Handler, Handler as Next, Middleware, MiddlewareConfig, Response } from './core/middleware'
export type { NunjucksEngineOptions, RenderContext, TemplateEngine, TemplateFilter } from './core/engine'
export type { ContextBuilder, PageOptions } from './middleware/page'
export type { LogOptions } from './middleware/log'
export type { TemplateOptions } from './middleware/template'
export type { Listener, ServerOptions } from './bin/runserver'
