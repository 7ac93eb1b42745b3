import 'dotenv/config'
import { createApp } from './app.js'
import { logger as bootLogger } from './logger.js'

async function main() {
  const { server, dependencies } = createApp()
  const { config, logger, registry } = dependencies

  const stopCleanup = registry.startCleanup(config.cleanupIntervalMs)
  server.addHook('onClose', async () => {
    stopCleanup()
  })

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info({ event: 'shutdown_requested', signal })
      server.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ event: 'shutdown_failed', error: err })
          process.exit(1)
        }
      )
    })
  }

  try {
    await server.listen({ port: config.port, host: '0.0.0.0' })
    logger.info({ event: 'server_started', port: config.port })
  } catch (err) {
    logger.error({ event: 'server_start_failed', error: err })
    process.exit(1)
  }
}

main().catch((err: unknown) => {
  bootLogger.error({ event: 'startup_failed', error: err })
  process.exit(1)
})
