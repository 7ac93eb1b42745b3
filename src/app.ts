import type { FastifyInstance } from 'fastify'
import { createLoggingClient, type LoggingClient } from './client/client.js'
import { createCommandRouter, type CommandRouter } from './commands.js'
import { loadConfig, type Config } from './config.js'
import type { SignupContext } from './flows/signup.js'
import { createLogger, type Logger } from './logger.js'
import { loadMessages, type Messages } from './messages.js'
import { createStageRegistry, type StageRegistry } from './stage/registry.js'
import { createServer } from './server.js'
import { createUpdateDispatcher, type UpdateDispatcher } from './updates/dispatcher.js'
import { createWebhookHandler, type WebhookHandler } from './webhook/handler.js'

export interface AppDependencies {
  config: Config
  logger: Logger
  messages: Messages
  client: LoggingClient
  dispatcher: UpdateDispatcher
  registry: StageRegistry<SignupContext>
  router: CommandRouter
  webhookHandler: WebhookHandler
}

export interface App {
  server: FastifyInstance
  dependencies: AppDependencies
}

export function createApp(env: NodeJS.ProcessEnv = process.env): App {
  const config = loadConfig(env)
  const logger = createLogger('chat-stage', config.logLevel)
  const messages = loadMessages()

  const client = createLoggingClient(config.bot, logger)
  const dispatcher = createUpdateDispatcher(logger)

  const registry = createStageRegistry<SignupContext>({
    updates: dispatcher,
    timeoutMs: config.stageTimeoutMs,
    logger
  })

  const router = createCommandRouter({
    updates: dispatcher,
    registry,
    client,
    messages,
    triggerCommand: config.triggerCommand,
    historyEnabled: config.historyEnabled,
    logger
  })

  const webhookHandler = createWebhookHandler({ dispatcher, logger })

  logger.info({
    event: 'dependencies_loaded',
    messageKeys: Object.keys(messages),
    botId: config.bot.id,
    triggerCommand: config.triggerCommand
  })

  const server = createServer(config, logger, webhookHandler)

  server.addHook('onClose', async () => {
    router.dispose()
    await registry.exitAll()
    registry.dispose()
  })

  return {
    server,
    dependencies: { config, logger, messages, client, dispatcher, registry, router, webhookHandler }
  }
}
