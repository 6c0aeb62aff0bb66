import { configure, reset, type LogRecord } from '@logtape/logtape'
import type {
  BodySize,
  MessageBody,
  RequestInfo,
  ServiceResponse,
} from '../access-log'
import { realIpRemoteAddr } from '../access-log/request-info'

export function createRequestInfo(
  overrides: Partial<{
    method: string
    path: string
    query: string
    version: string
    headers: Record<string, string>
    peer: string
  }> = {},
): RequestInfo {
  const headers = new Map<string, string>()
  for (const [name, value] of Object.entries(overrides.headers ?? {})) {
    headers.set(name.toLowerCase(), value)
  }
  const header = (name: string) => headers.get(name.toLowerCase())
  const peer = overrides.peer
  return {
    method: overrides.method ?? 'GET',
    path: overrides.path ?? '/',
    query: overrides.query ?? '',
    version: overrides.version ?? 'HTTP/1.1',
    header,
    peerAddr: () => peer,
    realIpRemoteAddr: () => realIpRemoteAddr(header, peer),
  }
}

/** Body over fixed chunks that records how far it was read. */
export class ChunkBody implements MessageBody {
  readonly size: BodySize
  pulled = 0
  finished = false
  private chunks: Uint8Array[]

  constructor(chunks: Array<string | Uint8Array>, size?: BodySize) {
    this.chunks = chunks.map((c) =>
      typeof c === 'string' ? Buffer.from(c) : c,
    )
    const length = this.chunks.reduce((n, c) => n + c.byteLength, 0)
    this.size = size ?? { kind: 'sized', length }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array> {
    try {
      for (const chunk of this.chunks) {
        this.pulled++
        yield chunk
      }
    } finally {
      this.finished = true
    }
  }
}

/** Body whose next pull fails after the given chunks. */
export class FailingBody implements MessageBody {
  readonly size: BodySize = { kind: 'stream' }
  private chunks: Uint8Array[]

  constructor(chunks: string[]) {
    this.chunks = chunks.map((c) => Buffer.from(c))
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array> {
    for (const chunk of this.chunks) {
      yield chunk
    }
    throw new Error('upstream reset')
  }
}

export function createResponse(
  overrides: Partial<{
    status: number
    headers: Record<string, string>
    body: MessageBody
    error: Error
  }> = {},
): ServiceResponse {
  const headers = new Map<string, string>()
  for (const [name, value] of Object.entries(overrides.headers ?? {})) {
    headers.set(name.toLowerCase(), value)
  }
  return {
    status: overrides.status ?? 200,
    header: (name) => headers.get(name.toLowerCase()),
    body: overrides.body ?? new ChunkBody([]),
    error: overrides.error,
  }
}

/** Drain a body, optionally stopping after `limit` chunks. */
export async function drain(
  body: MessageBody,
  limit = Infinity,
): Promise<Uint8Array[]> {
  const received: Uint8Array[] = []
  if (limit <= 0) return received
  for await (const chunk of body) {
    received.push(chunk)
    if (received.length >= limit) break
  }
  return received
}

export function createClock(start = Date.UTC(2026, 1, 5, 12, 0, 0)): {
  now: () => number
  advance: (ms: number) => void
} {
  let current = start
  return {
    now: () => current,
    advance: (ms) => {
      current += ms
    },
  }
}

/**
 * Route every `acclog` record into an array. Call `resetLogs()` afterwards.
 */
export async function captureLogs(
  lowestLevel: 'debug' | 'info' | 'warning' = 'debug',
): Promise<LogRecord[]> {
  const records: LogRecord[] = []
  await configure({
    sinks: {
      buffer: (record) => {
        records.push(record)
      },
    },
    loggers: [
      { category: 'acclog', sinks: ['buffer'], lowestLevel },
      { category: ['logtape', 'meta'], sinks: [], lowestLevel: 'warning' },
    ],
    reset: true,
  })
  return records
}

export async function resetLogs(): Promise<void> {
  await reset()
}

export function accessLines(records: LogRecord[]): string[] {
  const lines: string[] = []
  for (const record of records) {
    if (record.category.join('.') !== 'acclog.access') continue
    const line = record.properties.line
    if (typeof line === 'string') lines.push(line)
  }
  return lines
}

export function recordsAt(
  records: LogRecord[],
  level: LogRecord['level'],
): LogRecord[] {
  return records.filter((r) => r.level === level)
}
