import { describe, it, expect } from 'vitest'
import { createScopeFilter } from '../../src/stage/scope-filter.js'
import type { Update } from '../../src/updates/types.js'
import { BOT_ID, CHAT_ID, USER_ID, createCallbackQueryUpdate, createMessage, createTextUpdate } from '../mocks/updates.js'

describe('ScopeFilter', () => {
  describe('without a scope', () => {
    const filter = createScopeFilter({})

    it('should accept any message not sent by the bot', () => {
      expect(filter.matches(createTextUpdate('hi', { chatId: 1, fromId: 2 }), BOT_ID)).toBe(true)
    })

    it('should reject messages sent by the bot', () => {
      expect(filter.matches(createTextUpdate('hi', { fromId: BOT_ID }), BOT_ID)).toBe(false)
    })

    it('should reject updates without a message-like payload', () => {
      expect(filter.matches(createCallbackQueryUpdate('choice'), BOT_ID)).toBe(false)
      expect(filter.matches({ update_id: 1 }, BOT_ID)).toBe(false)
    })

    it('should accept messages without a sender', () => {
      const update: Update = { update_id: 1, channel_post: { message_id: 1, chat: { id: -100 } } }

      expect(filter.matches(update, BOT_ID)).toBe(true)
    })
  })

  describe('with a chat scope', () => {
    const filter = createScopeFilter({ chatId: CHAT_ID })

    it('should accept messages from the chat', () => {
      expect(filter.matches(createTextUpdate('hi'), BOT_ID)).toBe(true)
    })

    it('should reject messages from other chats', () => {
      expect(filter.matches(createTextUpdate('hi', { chatId: CHAT_ID + 1 }), BOT_ID)).toBe(false)
    })

    it('should reject bot messages in the chat', () => {
      expect(filter.matches(createTextUpdate('hi', { fromId: BOT_ID }), BOT_ID)).toBe(false)
    })

    it('should accept edited messages and channel posts from the chat', () => {
      expect(filter.matches(createTextUpdate('hi', { kind: 'edited_message' }), BOT_ID)).toBe(true)
      expect(filter.matches(createTextUpdate('hi', { kind: 'channel_post' }), BOT_ID)).toBe(true)
      expect(filter.matches(createTextUpdate('hi', { kind: 'edited_channel_post' }), BOT_ID)).toBe(true)
    })
  })

  describe('with a user scope', () => {
    const filter = createScopeFilter({ userId: USER_ID })

    it('should accept messages from the user in any chat', () => {
      expect(filter.matches(createTextUpdate('hi', { chatId: 99 }), BOT_ID)).toBe(true)
    })

    it('should reject messages from other users', () => {
      expect(filter.matches(createTextUpdate('hi', { fromId: USER_ID + 1 }), BOT_ID)).toBe(false)
    })

    it('should reject messages without a sender', () => {
      const update: Update = { update_id: 1, message: { message_id: 1, chat: { id: CHAT_ID } } }

      expect(filter.matches(update, BOT_ID)).toBe(false)
    })
  })

  describe('payload priority', () => {
    it('should judge a channel post before a plain message', () => {
      const filter = createScopeFilter({ chatId: CHAT_ID })
      const update: Update = {
        update_id: 1,
        message: createMessage({ chatId: CHAT_ID, text: 'plain' }),
        channel_post: createMessage({ chatId: 5, text: 'post' })
      }

      expect(filter.matches(update, BOT_ID)).toBe(false)
    })

    it('should judge an edited message before a plain message', () => {
      const filter = createScopeFilter({ chatId: CHAT_ID })
      const update: Update = {
        update_id: 1,
        message: createMessage({ chatId: 5, text: 'plain' }),
        edited_message: createMessage({ chatId: CHAT_ID, text: 'edit' })
      }

      expect(filter.matches(update, BOT_ID)).toBe(true)
    })
  })

  describe('contradicts', () => {
    const filter = createScopeFilter({ chatId: CHAT_ID, userId: USER_ID })

    it('should flag messages from another chat or user', () => {
      expect(filter.contradicts(createTextUpdate('hi', { chatId: CHAT_ID + 1 }))).toBe(true)
      expect(filter.contradicts(createTextUpdate('hi', { fromId: USER_ID + 1 }))).toBe(true)
    })

    it('should not flag in-scope messages or updates without a message payload', () => {
      expect(filter.contradicts(createTextUpdate('hi'))).toBe(false)
      expect(filter.contradicts(createCallbackQueryUpdate('choice'))).toBe(false)
    })

    it('should not flag anything without a scope', () => {
      expect(createScopeFilter({}).contradicts(createTextUpdate('hi', { chatId: 1, fromId: 2 }))).toBe(false)
    })
  })
})
