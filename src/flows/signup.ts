import type { SentMessage, StageClient } from '../client/client.js'
import { createNoopLogger, type Logger } from '../logger.js'
import { getMessage, type Messages } from '../messages.js'
import { createStage } from '../stage/stage.js'
import type { Stage, StageHandle } from '../stage/types.js'
import type { UpdateSource } from '../updates/dispatcher.js'
import { extractText } from '../updates/types.js'

export interface SignupContext {
  name?: string
  age?: number
  completed: boolean
}

export interface SignupStageDeps {
  client: StageClient
  updates: UpdateSource
  messages: Messages
  chatId: number
  userId?: number
  history?: boolean
  logger?: Logger
}

const MIN_AGE = 1
const MAX_AGE = 120

function parseAge(text: string | undefined): number | undefined {
  const trimmed = text?.trim() ?? ''
  if (!/^\d+$/.test(trimmed)) {
    return undefined
  }
  const age = Number(trimmed)
  return age >= MIN_AGE && age <= MAX_AGE ? age : undefined
}

/**
 * Three-step wizard: name, age, confirmation. Answering anything but "yes"
 * at the confirmation starts over.
 */
export function createSignupStage(deps: SignupStageDeps): Stage<SignupContext> {
  const { client, messages, chatId } = deps
  const logger = deps.logger ?? createNoopLogger()

  function reply(key: string, params: Record<string, string | number> = {}): Promise<SentMessage> {
    return client.sendMessage(chatId, getMessage(messages, key, params))
  }

  function awaitName(stage: StageHandle<SignupContext>): void {
    stage.awaitResponse(async (update) => {
      const name = extractText(update)?.trim()
      if (!name || name.startsWith('/')) {
        awaitName(stage)
        await reply('signup_name_empty')
        return
      }
      stage.context.name = name
      await stage.transition('ask_age')
    })
  }

  function awaitAge(stage: StageHandle<SignupContext>): void {
    stage.awaitResponse(async (update) => {
      const age = parseAge(extractText(update))
      if (age === undefined) {
        awaitAge(stage)
        await reply('signup_age_invalid')
        return
      }
      stage.context.age = age
      await stage.transition('confirm')
    })
  }

  const stage = createStage<SignupContext>({
    client,
    updates: deps.updates,
    chatId,
    userId: deps.userId,
    history: deps.history,
    logger,
    context: { completed: false }
  })

  stage
    .on('ask_name', async (s) => {
      awaitName(s)
      await reply('signup_ask_name')
    }, { initial: true })
    .on('ask_age', async (s) => {
      awaitAge(s)
      await reply('signup_ask_age', { name: s.context.name ?? '' })
    })
    .on('confirm', async (s) => {
      s.awaitResponse(async (update) => {
        const answer = extractText(update)?.trim().toLowerCase()
        if (answer === 'yes') {
          s.context.completed = true
          await s.exit()
          return
        }
        s.context = { completed: false }
        await reply('signup_restart')
        await s.transition('ask_name')
      })
      await reply('signup_confirm', { name: s.context.name ?? '', age: s.context.age ?? '' })
    })
    .onExit(async (context) => {
      if (!context.completed) {
        logger.info({ event: 'signup_abandoned', chatId, userId: deps.userId })
        return
      }
      logger.info({ event: 'signup_completed', chatId, userId: deps.userId, name: context.name, age: context.age })
      await reply('signup_done', { name: context.name ?? '' })
    })

  return stage
}
