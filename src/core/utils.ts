import { HEADERS, STATUS, TEMPLATE, THREW } from './prelude'
import type { Headers, HttpMetadata } from './prelude'

function _isHeaders (value: unknown): value is Headers {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function _isPipeable (value: unknown): value is NodeJS.ReadableStream {
  return (
    typeof value === 'object' &&
    value !== null &&
    'pipe' in value &&
    typeof value.pipe === 'function'
  )
}

// Copies the symbol-keyed response metadata off of any handler result.
// Headers are returned by reference so later middleware can add to them.
function _readMetadata (value: unknown): HttpMetadata {
  if (typeof value !== 'object' || value === null) {
    return {}
  }

  const status: unknown = Reflect.get(value, STATUS)
  const headers: unknown = Reflect.get(value, HEADERS)
  const threw: unknown = Reflect.get(value, THREW)
  const template: unknown = Reflect.get(value, TEMPLATE)

  return {
    [STATUS]: typeof status === 'number' ? status : undefined,
    [HEADERS]: _isHeaders(headers) ? headers : undefined,
    [THREW]: threw === true,
    [TEMPLATE]: typeof template === 'string' ? template : undefined,
  }
}

export { _isHeaders, _isPipeable, _readMetadata }
