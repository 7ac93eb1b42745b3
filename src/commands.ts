import { bindCallbackQuery, type StageClient } from './client/client.js'
import { createSignupStage, type SignupContext } from './flows/signup.js'
import { createNoopLogger, type Logger } from './logger.js'
import { getMessage, type Messages } from './messages.js'
import type { StageRegistry } from './stage/registry.js'
import type { Subscription, UpdateSource } from './updates/dispatcher.js'
import { extractMessage, type Update } from './updates/types.js'

export interface CommandRouterDeps {
  updates: UpdateSource
  registry: StageRegistry<SignupContext>
  client: StageClient
  messages: Messages
  triggerCommand: string
  historyEnabled?: boolean
  logger?: Logger
}

export interface CommandRouter {
  isTrigger(update: Update): boolean
  dispose(): void
}

/**
 * Starts a signup stage for whoever sends the trigger command and
 * acknowledges callback queries.
 */
export function createCommandRouter(deps: CommandRouterDeps): CommandRouter {
  const { updates, registry, client, messages, triggerCommand } = deps
  const logger = deps.logger ?? createNoopLogger()

  function isTrigger(update: Update): boolean {
    const message = extractMessage(update)
    if (!message?.text || message.from?.id === client.bot.id) {
      return false
    }
    const [command, mention] = message.text.trim().toLowerCase().split('@', 2)
    if (command !== triggerCommand.toLowerCase()) {
      return false
    }
    // "/signup@some_bot" only counts when it names this bot
    return mention === undefined || mention === client.bot.username?.toLowerCase()
  }

  async function startSignup(update: Update): Promise<void> {
    const message = extractMessage(update)
    if (!message) {
      return
    }
    const chatId = message.chat.id
    const userId = message.from?.id

    logger.info({ event: 'trigger_matched', chatId, userId })

    await registry.enter({ chatId, userId }, () => createSignupStage({
      client,
      updates,
      messages,
      chatId,
      userId,
      history: deps.historyEnabled,
      logger
    }))
  }

  async function acknowledgeCallbackQuery(update: Update): Promise<void> {
    if (!update.callback_query) {
      return
    }
    const query = bindCallbackQuery(update.callback_query, client)
    await query.answer({ text: getMessage(messages, 'callback_acknowledged') })
  }

  const subscriptions: Subscription[] = [
    updates.subscribe(isTrigger, startSignup, { group: 'commands' }),
    updates.subscribe(update => update.callback_query !== undefined, acknowledgeCallbackQuery, { group: 'callback-queries' })
  ]

  function dispose(): void {
    for (const subscription of subscriptions) {
      updates.unsubscribe(subscription)
    }
  }

  return { isTrigger, dispose }
}
