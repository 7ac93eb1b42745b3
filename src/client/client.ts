import { createNoopLogger, type Logger } from '../logger.js'
import type { CallbackQuery } from '../updates/types.js'

export interface BotIdentity {
  id: number
  username?: string
}

export interface SentMessage {
  messageId: number
  chatId: number
  text: string
}

export interface AnswerCallbackQueryOptions {
  text?: string
  showAlert?: boolean
  url?: string
  cacheTime?: number
}

export interface StageClient {
  readonly bot: BotIdentity
  sendMessage(chatId: number, text: string): Promise<SentMessage>
  answerCallbackQuery(callbackQueryId: string, options?: AnswerCallbackQueryOptions): Promise<boolean>
}

export interface AnsweredCallbackQuery {
  callbackQueryId: string
  options: AnswerCallbackQueryOptions
}

export interface LoggingClient extends StageClient {
  getSentMessages(): SentMessage[]
  getAnsweredCallbackQueries(): AnsweredCallbackQuery[]
}

/**
 * Client that records outbound calls and writes them to the log instead of
 * talking to a transport.
 */
export function createLoggingClient(bot: BotIdentity, logger?: Logger): LoggingClient {
  const log = logger ?? createNoopLogger()
  const sentMessages: SentMessage[] = []
  const answered: AnsweredCallbackQuery[] = []
  let messageCounter = 0

  async function sendMessage(chatId: number, text: string): Promise<SentMessage> {
    messageCounter++
    const message: SentMessage = { messageId: messageCounter, chatId, text }
    sentMessages.push(message)

    log.info({ event: 'client_send_message', chatId, messageId: message.messageId, text })

    return message
  }

  async function answerCallbackQuery(
    callbackQueryId: string,
    options: AnswerCallbackQueryOptions = {}
  ): Promise<boolean> {
    answered.push({ callbackQueryId, options })
    log.info({ event: 'client_answer_callback_query', callbackQueryId, text: options.text })
    return true
  }

  function getSentMessages(): SentMessage[] {
    return [...sentMessages]
  }

  function getAnsweredCallbackQueries(): AnsweredCallbackQuery[] {
    return [...answered]
  }

  return { bot, sendMessage, answerCallbackQuery, getSentMessages, getAnsweredCallbackQueries }
}

export interface BoundCallbackQuery extends CallbackQuery {
  answer(options?: AnswerCallbackQueryOptions): Promise<boolean>
}

export function bindCallbackQuery(query: CallbackQuery, client: StageClient): BoundCallbackQuery {
  return {
    ...query,
    answer: (options?: AnswerCallbackQueryOptions) => client.answerCallbackQuery(query.id, options)
  }
}
