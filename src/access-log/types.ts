/**
 * Read-only view of an incoming request, as seen by format resolution and
 * custom field callbacks.
 */
export interface RequestInfo {
  method: string
  path: string
  /** Query string without the leading `?`, empty when there is none. */
  query: string
  /** Protocol version as written on the request line, e.g. `HTTP/1.1`. */
  version: string
  /** Header value, or undefined when absent or not visible ASCII. */
  header(name: string): string | undefined
  peerAddr(): string | undefined
  realIpRemoteAddr(): string | undefined
}

export interface ResponseInfo {
  status: number
  header(name: string): string | undefined
}

export type BodySize =
  | { kind: 'none' }
  | { kind: 'sized'; length: number }
  | { kind: 'stream' }

/**
 * A response body, drained exactly once by the transport. A transport that
 * drops a body without draining it calls `release()` when present.
 */
export interface MessageBody extends AsyncIterable<Uint8Array> {
  readonly size: BodySize
  release?(): void
}

export interface ServiceResponse extends ResponseInfo {
  body: MessageBody
  /** Error the inner stage attached to an otherwise produced response. */
  error?: Error
}

export type Service<Req extends RequestInfo = RequestInfo> = (
  req: Req,
) => Promise<ServiceResponse>

export type EnvLookup = (name: string) => string | undefined

/** Epoch milliseconds, fractional where the platform allows. */
export type Clock = () => number

export type CustomRequestFn = (req: RequestInfo) => string
