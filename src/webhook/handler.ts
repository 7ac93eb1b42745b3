import { UpdateError } from '../errors.js'
import { createNoopLogger, type Logger } from '../logger.js'
import type { UpdateDispatcher } from '../updates/dispatcher.js'
import { extractMessage, updateSchema, type Update } from '../updates/types.js'

export interface WebhookHandlerDeps {
  dispatcher: UpdateDispatcher
  logger?: Logger
}

export interface WebhookHandlerResult {
  handled: boolean
  updateId: number
}

export function createWebhookHandler(deps: WebhookHandlerDeps) {
  const { dispatcher } = deps
  const logger = deps.logger ?? createNoopLogger()

  function parseUpdate(body: unknown): Update {
    const result = updateSchema.safeParse(body)
    if (!result.success) {
      const field = result.error.errors[0]?.path.join('.') || 'unknown'
      logger.error({ event: 'webhook_parse_error', error: result.error.message, field })
      throw new UpdateError(`Invalid update payload: ${result.error.message}`, field)
    }
    return result.data
  }

  async function handle(body: unknown): Promise<WebhookHandlerResult> {
    const update = parseUpdate(body)
    const message = extractMessage(update)

    logger.info({
      event: 'update_received',
      updateId: update.update_id,
      chatId: message?.chat.id,
      fromId: message?.from?.id ?? update.callback_query?.from.id,
      hasCallbackQuery: update.callback_query !== undefined
    })

    await dispatcher.dispatch(update)

    logger.info({ event: 'update_dispatched', updateId: update.update_id })
    return { handled: true, updateId: update.update_id }
  }

  return { handle, parseUpdate }
}

export type WebhookHandler = ReturnType<typeof createWebhookHandler>
