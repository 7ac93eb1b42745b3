import { describe, it, expect } from 'vitest'
import { extractMessage, extractText, updateSchema, type Update } from '../../src/updates/types.js'
import { createCallbackQueryUpdate, createMessage } from '../mocks/updates.js'

describe('updateSchema', () => {
  it('should parse a text message update', () => {
    const result = updateSchema.safeParse({
      update_id: 10,
      message: {
        message_id: 1,
        date: 1700000000,
        chat: { id: 42, type: 'private' },
        from: { id: 7, is_bot: false, first_name: 'Ada' },
        text: 'hello'
      }
    })

    expect(result.success).toBe(true)
    expect(result.data?.message?.text).toBe('hello')
  })

  it('should keep fields it does not model', () => {
    const result = updateSchema.parse({
      update_id: 11,
      poll: { id: 'poll-1' },
      message: { message_id: 2, chat: { id: 42 }, sticker: { file_id: 'abc' } }
    })

    expect(result.poll).toEqual({ id: 'poll-1' })
    expect(result.message?.sticker).toEqual({ file_id: 'abc' })
  })

  it('should parse callback queries and documents', () => {
    const result = updateSchema.parse({
      update_id: 12,
      callback_query: {
        id: 'cbq-1',
        from: { id: 7 },
        data: 'yes',
        message: {
          message_id: 3,
          chat: { id: 42 },
          document: { file_id: 'doc-1', file_unique_id: 'u-1', file_name: 'terms.pdf' }
        }
      }
    })

    expect(result.callback_query?.data).toBe('yes')
    expect(result.callback_query?.message?.document?.file_name).toBe('terms.pdf')
  })

  it('should reject a message without a chat', () => {
    const result = updateSchema.safeParse({ update_id: 13, message: { message_id: 4 } })

    expect(result.success).toBe(false)
    expect(result.error?.errors[0]?.path).toEqual(['message', 'chat'])
  })

  it('should reject a missing update id', () => {
    const result = updateSchema.safeParse({ message: { message_id: 4, chat: { id: 1 } } })

    expect(result.success).toBe(false)
    expect(result.error?.errors[0]?.path).toEqual(['update_id'])
  })
})

describe('extractMessage', () => {
  const message = createMessage({ text: 'message' })
  const editedMessage = createMessage({ text: 'edited_message' })
  const channelPost = createMessage({ text: 'channel_post' })
  const editedChannelPost = createMessage({ text: 'edited_channel_post' })

  it('should prefer channel posts over everything else', () => {
    const update: Update = {
      update_id: 1,
      message,
      edited_message: editedMessage,
      channel_post: channelPost,
      edited_channel_post: editedChannelPost
    }

    expect(extractMessage(update)).toBe(channelPost)
  })

  it('should prefer edited channel posts over edited messages', () => {
    const update: Update = { update_id: 1, message, edited_message: editedMessage, edited_channel_post: editedChannelPost }

    expect(extractMessage(update)).toBe(editedChannelPost)
  })

  it('should prefer edited messages over plain messages', () => {
    const update: Update = { update_id: 1, message, edited_message: editedMessage }

    expect(extractMessage(update)).toBe(editedMessage)
  })

  it('should fall back to the plain message', () => {
    expect(extractMessage({ update_id: 1, message })).toBe(message)
  })

  it('should ignore the message nested in a callback query', () => {
    expect(extractMessage(createCallbackQueryUpdate('x'))).toBeUndefined()
  })

  it('should extract the text of the chosen payload', () => {
    expect(extractText({ update_id: 1, message, edited_message: editedMessage })).toBe('edited_message')
    expect(extractText({ update_id: 1 })).toBeUndefined()
  })
})
