import type { BodySize, MessageBody } from './types'

/**
 * Running byte total with a one-shot release action. The action receives the
 * final count and runs at most once, however many times release is called.
 */
export class ByteCounter {
  private bytes = 0
  private released = false
  private onRelease: (bytes: number) => void

  constructor(onRelease: (bytes: number) => void) {
    this.onRelease = onRelease
  }

  add(length: number): void {
    this.bytes += length
  }

  get total(): number {
    return this.bytes
  }

  get isReleased(): boolean {
    return this.released
  }

  release(): void {
    if (this.released) return
    this.released = true
    this.onRelease(this.bytes)
  }
}

/**
 * Body decorator that counts the bytes the transport pulls and releases its
 * counter when the body is done with: exhausted, abandoned through the
 * iterator's `return()`, failed, or dropped via `release()`.
 */
export class LoggedBody implements MessageBody {
  private body: MessageBody
  private counter: ByteCounter

  constructor(body: MessageBody, counter: ByteCounter) {
    this.body = body
    this.counter = counter
  }

  get size(): BodySize {
    return this.body.size
  }

  get bytesPulled(): number {
    return this.counter.total
  }

  /**
   * A generator closed before its first pull never runs its `finally`, so
   * `return()` and `throw()` release the counter themselves.
   */
  [Symbol.asyncIterator](): AsyncIterator<Uint8Array, void, undefined> {
    const chunks = this.pull()
    const counter = this.counter
    return {
      next: () => chunks.next(),
      return: (value) => {
        counter.release()
        return chunks.return(value)
      },
      throw: (err: unknown) => {
        counter.release()
        return chunks.throw(err)
      },
    }
  }

  private async *pull(): AsyncGenerator<Uint8Array, void, undefined> {
    try {
      for await (const chunk of this.body) {
        this.counter.add(chunk.byteLength)
        yield chunk
      }
    } finally {
      this.counter.release()
    }
  }

  /**
   * For transports that discard a body without iterating it, e.g. the
   * response to a HEAD request or a connection that closed first.
   */
  release(): void {
    this.body.release?.()
    this.counter.release()
  }
}
