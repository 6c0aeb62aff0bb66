import { AsyncLocalStorage } from 'node:async_hooks'
import http from 'node:http'
import { configure, getConsoleSink } from '@logtape/logtape'
import express from 'express'
import helmet from 'helmet'
import { createHttpTerminator, type HttpTerminator } from 'http-terminator'
import { AccessLog } from './access-log'
import type { AccessLogServiceConfig } from './config'
import { accessLineFormatter, logger } from './logger'

export * from './access-log'
export * from './config'
export { logger } from './logger'

export class AccessLogService {
  private cfg: AccessLogServiceConfig
  private app: express.Application
  private server?: http.Server
  private terminator?: HttpTerminator

  constructor(opts: {
    cfg: AccessLogServiceConfig
    app: express.Application
  }) {
    this.cfg = opts.cfg
    this.app = opts.app
  }

  static async create(
    cfg: AccessLogServiceConfig,
  ): Promise<AccessLogService> {
    await configure({
      sinks: {
        console: getConsoleSink({ formatter: accessLineFormatter }),
      },
      loggers: [
        {
          category: 'acclog',
          sinks: ['console'],
          lowestLevel: cfg.logging.level,
        },
        {
          category: ['logtape', 'meta'],
          sinks: ['console'],
          lowestLevel: 'warning',
        },
      ],
      contextLocalStorage: new AsyncLocalStorage(),
    })

    return new AccessLogService({ cfg, app: createApp(cfg) })
  }

  async start(): Promise<http.Server> {
    const port = this.cfg.service.port
    this.server = this.app.listen(port, () => {
      logger.info('access log service started on port {port}', { port })
    })
    this.terminator = createHttpTerminator({ server: this.server })
    return this.server
  }

  async destroy(): Promise<void> {
    logger.info('shutting down access log service')

    if (this.terminator) {
      await this.terminator.terminate()
      this.terminator = undefined
    }

    logger.info('access log service stopped')
  }
}

export function createAccessLog(cfg: AccessLogServiceConfig): AccessLog {
  const accessLog = new AccessLog(cfg.accessLog.format)
  for (const path of cfg.accessLog.exclude) {
    accessLog.exclude(path)
  }
  for (const pattern of cfg.accessLog.excludeRegex) {
    accessLog.excludeRegex(pattern)
  }
  return accessLog
}

export function createApp(
  cfg: AccessLogServiceConfig,
  accessLog: AccessLog = createAccessLog(cfg),
): express.Application {
  const app = express()

  app.use(accessLog.middleware())
  app.use(helmet())

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' })
  })

  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      _next: express.NextFunction,
    ) => {
      logger.error('unhandled error at {path}: {err}', {
        err,
        path: req.path,
      })
      res.status(500).json({ error: 'Internal server error' })
    },
  )

  return app
}
