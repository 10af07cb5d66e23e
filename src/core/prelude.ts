import { readFileSync } from 'fs'
import path from 'path'

const serviceName = _getServiceName()

function _getServiceName (): string {
  if (process.env.SERVICE_NAME) {
    return process.env.SERVICE_NAME
  }

  let pkg: unknown
  try {
    pkg = JSON.parse(readFileSync(path.join(process.cwd(), 'package.json'), 'utf8'))
  } catch {
    return 'autopage'
  }

  if (pkg && typeof pkg === 'object' && 'name' in pkg && typeof pkg.name === 'string') {
    return pkg.name.split('/').pop() || 'autopage'
  }
  return 'autopage'
}

const THREW = Symbol.for('threw')
const STATUS = Symbol.for('status')
const HEADERS = Symbol.for('headers')
const TEMPLATE = Symbol.for('template')

type Headers = Record<string, string | string[]>

interface HttpMetadata {
  [STATUS]?: number
  [HEADERS]?: Headers
  [THREW]?: boolean
  [TEMPLATE]?: string
}

export {
  serviceName,
  THREW,
  STATUS,
  HEADERS,
  TEMPLATE,
}
export type { Headers, HttpMetadata }
