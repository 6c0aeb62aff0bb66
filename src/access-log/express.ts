import type { Request, Response } from 'express'
import {
  formatPeerAddr,
  headerValue,
  realIpRemoteAddr,
} from './request-info'
import type { RequestInfo, ResponseInfo } from './types'

/** Split a request target into path and query (without the `?`). */
export function splitUrl(url: string): { path: string; query: string } {
  const q = url.indexOf('?')
  if (q === -1) return { path: url, query: '' }
  return { path: url.slice(0, q), query: url.slice(q + 1) }
}

/**
 * Request view over an Express request. Uses `originalUrl` so the path is
 * the same wherever the middleware is mounted.
 */
export function expressRequestInfo(req: Request): RequestInfo {
  const { path, query } = splitUrl(req.originalUrl)
  const header = (name: string) => {
    const key = name.toLowerCase()
    return Object.hasOwn(req.headers, key)
      ? headerValue(req.headers[key])
      : undefined
  }
  const peerAddr = () =>
    formatPeerAddr(req.socket.remoteAddress, req.socket.remotePort)

  return {
    method: req.method,
    path,
    query,
    version: `HTTP/${req.httpVersion}`,
    header,
    peerAddr,
    realIpRemoteAddr: () => realIpRemoteAddr(header, peerAddr()),
  }
}

export function expressResponseInfo(res: Response): ResponseInfo {
  return {
    status: res.statusCode,
    header: (name) => headerValue(res.getHeader(name)),
  }
}

/** Byte length of a chunk handed to `res.write` or `res.end`. */
export function chunkLength(chunk: unknown, encoding: unknown): number {
  if (typeof chunk === 'string') {
    const enc =
      typeof encoding === 'string' && Buffer.isEncoding(encoding)
        ? encoding
        : 'utf8'
    return Buffer.byteLength(chunk, enc)
  }
  if (chunk instanceof Uint8Array) {
    return chunk.byteLength
  }
  return 0
}

/**
 * Route every chunk written to `res` through `observe` before Node sees it.
 * `res.end(callback)` carries no chunk.
 */
export function observeWrites(
  res: Response,
  observe: (chunk: unknown, encoding: unknown) => void,
): void {
  const write = res.write
  const end = res.end

  res.write = function (
    this: Response,
    chunk: unknown,
    ...rest: unknown[]
  ): boolean {
    observe(chunk, rest[0])
    return Reflect.apply(write, this, [chunk, ...rest])
  }

  res.end = function (this: Response, ...args: unknown[]): Response {
    if (args.length > 0 && typeof args[0] !== 'function') {
      observe(args[0], args[1])
    } else {
      observe(undefined, undefined)
    }
    return Reflect.apply(end, this, args)
  }
}
