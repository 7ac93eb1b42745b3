import { vi } from 'vitest'
import type { CallbackQuery, Message, Update } from '../../src/updates/types.js'

export const BOT_ID = 100000001
export const CHAT_ID = 4242
export const USER_ID = 777

let updateCounter = 0
let messageCounter = 0

export interface MessageOptions {
  chatId?: number
  fromId?: number
  text?: string
}

export function createMessage(options: MessageOptions = {}): Message {
  const message: Message = {
    message_id: ++messageCounter,
    date: 1700000000,
    chat: { id: options.chatId ?? CHAT_ID, type: 'private' },
    from: { id: options.fromId ?? USER_ID, is_bot: options.fromId === BOT_ID, first_name: 'Test' }
  }
  if (options.text !== undefined) {
    message.text = options.text
  }
  return message
}

export type PayloadKind = 'message' | 'edited_message' | 'channel_post' | 'edited_channel_post'

export function createTextUpdate(text: string, options: MessageOptions & { kind?: PayloadKind } = {}): Update {
  const kind = options.kind ?? 'message'
  const update: Update = { update_id: ++updateCounter }
  update[kind] = createMessage({ ...options, text })
  return update
}

export function createCallbackQueryUpdate(data: string, fromId = USER_ID): Update {
  const query: CallbackQuery = {
    id: `cbq-${++updateCounter}`,
    from: { id: fromId, first_name: 'Test' },
    message: createMessage({ fromId: BOT_ID, text: 'Pick one' }),
    chat_instance: 'instance-1',
    data
  }
  return { update_id: updateCounter, callback_query: query }
}

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}
