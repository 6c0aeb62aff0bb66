import { AccessLogService, envToConfig, readEnv } from './index'
import { logger } from './logger'

async function main(): Promise<void> {
  const cfg = envToConfig(readEnv())
  const service = await AccessLogService.create(cfg)
  await service.start()

  const shutdown = () => {
    service.destroy().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('shutdown failed: {err}', { err })
        process.exit(1)
      },
    )
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

main().catch((err: unknown) => {
  console.error(err)
  process.exit(1)
})
