import isDev from 'are-we-dev'
import { Environment, FileSystemLoader } from 'nunjucks'
import type { ConfigureOptions, Extension } from 'nunjucks'
import { readdirSync, realpathSync, statSync } from 'fs'
import path from 'path'

type RenderContext = Record<string, unknown>

/**
 * What the template middleware needs from a template engine: the set of
 * template names it knows about, and a way to render one of them.
 */
interface TemplateEngine {
  templateNames(): ReadonlySet<string>
  render(name: string, context: RenderContext): string
}

interface TemplateFilter {
  (value: unknown, ...args: unknown[]): unknown
}

interface NunjucksEngineOptions {
  paths?: string[]
  extensions?: string[]
  filters?: Record<string, TemplateFilter>
  tags?: Record<string, Extension>
  opts?: ConfigureOptions
}

function isTemplateEngine (value: unknown): value is TemplateEngine {
  return (
    typeof value === 'object' &&
    value !== null &&
    'templateNames' in value &&
    typeof value.templateNames === 'function' &&
    'render' in value &&
    typeof value.render === 'function'
  )
}

class NunjucksEngine implements TemplateEngine {
  public readonly paths: string[]
  private readonly extensions: string[]
  private readonly env: Environment
  private readonly noCache: boolean
  private _names?: ReadonlySet<string>

  constructor ({
    paths = ['templates'],
    extensions = ['.html'],
    filters = {},
    tags = {},
    opts = { noCache: isDev() },
  }: NunjucksEngineOptions = {}) {
    if (!Array.isArray(paths) || !paths.every(xs => typeof xs === 'string')) {
      throw new TypeError('The `paths` option must be an array of path strings')
    }

    this.paths = paths.map(xs => path.resolve(xs))
    this.extensions = extensions
    this.noCache = Boolean(opts.noCache)
    this.env = new Environment(new FileSystemLoader(this.paths, { noCache: this.noCache }), opts)

    for (const [name, filter] of Object.entries(filters)) {
      this.env.addFilter(name, filter)
    }

    for (const [name, tag] of Object.entries(tags)) {
      this.env.addExtension(name, tag)
    }
  }

  templateNames (): ReadonlySet<string> {
    if (this._names && !this.noCache) {
      return this._names
    }
    this._names = this.scan()
    return this._names
  }

  reload (): ReadonlySet<string> {
    this._names = this.scan()
    return this._names
  }

  render (name: string, context: RenderContext): string {
    return this.env.render(name, context)
  }

  private scan (): ReadonlySet<string> {
    // earlier search paths shadow later ones, same as the loader
    const names = new Set<string>()
    for (const root of this.paths) {
      for (const name of walk(root, '')) {
        if (this.extensions.includes(path.extname(name))) {
          names.add(name)
        }
      }
    }
    return names
  }
}

// Follows symlinks like the loader does; skips directory links back to an ancestor.
function * walk (root: string, prefix: string, ancestors: ReadonlySet<string> = new Set()): Generator<string> {
  const dir = path.join(root, prefix)
  let entries
  let real: string
  try {
    real = realpathSync(dir)
    entries = readdirSync(dir, { withFileTypes: true })
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return
    }
    throw err
  }

  if (ancestors.has(real)) {
    return
  }
  const lineage = new Set(ancestors).add(real)

  for (const entry of entries) {
    const name = prefix ? `${prefix}/${entry.name}` : entry.name
    const stats = entry.isSymbolicLink()
      ? statSync(path.join(root, name), { throwIfNoEntry: false })
      : entry

    if (!stats) {
      continue
    }
    if (stats.isDirectory()) {
      yield * walk(root, name, lineage)
    } else if (stats.isFile()) {
      yield name
    }
  }
}

export { NunjucksEngine, isTemplateEngine }
export type { NunjucksEngineOptions, RenderContext, TemplateEngine, TemplateFilter }
