/**
 * Access log module.
 *
 * A format string is compiled once into units. Each request gets a copy
 * whose units collapse to strings in two passes, one over the request before
 * the inner stage runs and one over the response once it exists. The copy is
 * rendered when the response body is released, with the byte count and the
 * time taken, and written as a single line to the `acclog.access` logger.
 *
 * Key exports:
 * - AccessLog: configuration plus the Express middleware and service wrapper
 * - Format / compileFormat: the format compiler
 * - LoggedBody / ByteCounter: body decoration and release
 */

export { AccessLog } from './access-log'
export type { AccessLogOptions } from './access-log'
export { ByteCounter, LoggedBody } from './body'
export { ExclusionFilter } from './exclusion'
export { expressRequestInfo, expressResponseInfo } from './express'
export { compileFormat, DEFAULT_FORMAT, Format } from './format'
export type { FormatSlot, FormatText, ResolvedFormat } from './format'
export { renderLine } from './render'
export { realIpRemoteAddr } from './request-info'
export { resolveRequest, resolveResponse } from './resolve'
export type {
  BodySize,
  Clock,
  CustomRequestFn,
  EnvLookup,
  MessageBody,
  RequestInfo,
  ResponseInfo,
  Service,
  ServiceResponse,
} from './types'
