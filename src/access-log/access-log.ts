import type { RequestHandler } from 'express'
import { accessLogger, logger } from '../logger'
import { ByteCounter, LoggedBody } from './body'
import { ExclusionFilter } from './exclusion'
import {
  chunkLength,
  expressRequestInfo,
  expressResponseInfo,
  observeWrites,
  splitUrl,
} from './express'
import { DEFAULT_FORMAT, Format } from './format'
import type { ResolvedFormat } from './format'
import { renderLine } from './render'
import { resolveRequest, resolveResponse } from './resolve'
import type {
  Clock,
  CustomRequestFn,
  EnvLookup,
  RequestInfo,
  Service,
} from './types'

export interface AccessLogOptions {
  /** Defaults to the high-resolution wall clock. */
  clock?: Clock
  /** Defaults to `process.env`. */
  env?: EnvLookup
}

const defaultClock: Clock = () => performance.timeOrigin + performance.now()
const defaultEnv: EnvLookup = (name) =>
  Object.hasOwn(process.env, name) ? process.env[name] : undefined

/**
 * Access log middleware: one line per request, written when the response
 * body is released.
 *
 * ```typescript
 * const accessLog = new AccessLog('%a "%r" %s %b %{JWT_ID}xi')
 *   .exclude('/health')
 *   .excludeRegex('^/static/')
 *   .customRequestReplace('JWT_ID', (req) => jwtId(req.header('authorization')))
 *
 * app.use(accessLog.middleware())
 * ```
 *
 * Configuration is frozen once `middleware()` or `wrap()` has been called.
 *
 * Directives: `%%` percent sign, `%a` peer address, `%{r}a` address from
 * proxy headers, `%t` request start time, `%r` request line, `%s` status,
 * `%b` body bytes sent, `%T` seconds taken, `%D` milliseconds taken, `%U`
 * URL path, `%{NAME}i` request header, `%{NAME}o` response header,
 * `%{NAME}e` environment variable, `%{NAME}xi` custom replacement.
 */
export class AccessLog {
  private format: Format
  private exclusions = new ExclusionFilter()
  private clock: Clock
  private env: EnvLookup
  private sealed = false

  constructor(format: string = DEFAULT_FORMAT, opts: AccessLogOptions = {}) {
    this.format = Format.parse(format)
    this.clock = opts.clock ?? defaultClock
    this.env = opts.env ?? defaultEnv
  }

  /** Do not log requests for this exact path. */
  exclude(path: string): this {
    this.assertConfigurable()
    this.exclusions.add(path)
    return this
  }

  /** Do not log requests whose path matches `pattern`. */
  excludeRegex(pattern: string | RegExp): this {
    this.assertConfigurable()
    this.exclusions.addPattern(pattern)
    return this
  }

  /**
   * Supply the value for `%{label}xi`. The callback runs once per request
   * before the inner stage; by convention it returns `-` when it has nothing
   * to say. Registering the same label again replaces the callback.
   */
  customRequestReplace(label: string, fn: CustomRequestFn): this {
    this.assertConfigurable()
    const units = this.format.customRequests(label)
    if (units.length === 0) {
      logger.debug(
        'custom request replacement registered for nonexistent label {label}',
        { label },
      )
      return this
    }
    for (const unit of units) {
      unit.fn = fn
    }
    return this
  }

  isExcluded(path: string): boolean {
    return this.exclusions.matches(path)
  }

  /** Express middleware; counts bytes passed to `res.write` and `res.end`. */
  middleware(): RequestHandler {
    this.attach()
    return (req, res, next) => {
      if (this.isExcluded(splitUrl(req.originalUrl).path)) {
        next()
        return
      }

      const { line, startedAt } = this.begin(expressRequestInfo(req))

      let responded = false
      const respond = () => {
        if (responded) return
        responded = true
        resolveResponse(line, expressResponseInfo(res))
      }

      const counter = new ByteCounter((bytes) => {
        respond()
        this.emit(line, startedAt, bytes)
      })

      observeWrites(res, (chunk, encoding) => {
        if (counter.isReleased) return
        respond()
        counter.add(chunkLength(chunk, encoding))
      })
      res.once('finish', () => counter.release())
      res.once('close', () => counter.release())

      next()
    }
  }

  /**
   * Wrap a service so each response body it produces is counted and logged
   * when released. Errors from the service propagate unchanged and are not
   * logged as access lines.
   */
  wrap<Req extends RequestInfo>(service: Service<Req>): Service<Req> {
    this.attach()
    return async (req) => {
      if (this.isExcluded(req.path)) {
        return service(req)
      }

      const { line, startedAt } = this.begin(req)
      const res = await service(req)

      if (res.error && res.status !== 500) {
        logger.debug('error in response: {err}', { err: res.error })
      }

      resolveResponse(line, res)
      const counter = new ByteCounter((bytes) =>
        this.emit(line, startedAt, bytes),
      )
      res.body = new LoggedBody(res.body, counter)
      return res
    }
  }

  private begin(req: RequestInfo): {
    line: ResolvedFormat
    startedAt: number
  } {
    const startedAt = this.clock()
    const line = this.format.bind()
    resolveRequest(line, startedAt, req, this.env)
    return { line, startedAt }
  }

  private emit(line: ResolvedFormat, startedAt: number, bytes: number): void {
    // rendering is skipped entirely when info is disabled for the category
    accessLogger.info('{line}', () => ({
      line: renderLine(line, bytes, Math.max(0, this.clock() - startedAt)),
    }))
  }

  private attach(): void {
    this.sealed = true
    for (const label of this.format.unboundLabels()) {
      logger.warn(
        'no custom request replacement registered for label {label}',
        { label },
      )
    }
  }

  private assertConfigurable(): void {
    if (this.sealed) {
      throw new Error(
        'AccessLog cannot be reconfigured after it has been attached',
      )
    }
  }
}
