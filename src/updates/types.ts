import { z } from 'zod'

export const userSchema = z.object({
  id: z.number().int(),
  is_bot: z.boolean().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  username: z.string().optional(),
  language_code: z.string().optional()
}).passthrough()

export const chatSchema = z.object({
  id: z.number().int(),
  type: z.string().optional(),
  title: z.string().optional(),
  username: z.string().optional()
}).passthrough()

export const documentSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string(),
  file_name: z.string().optional(),
  mime_type: z.string().optional(),
  file_size: z.number().int().optional()
})

export const messageSchema = z.object({
  message_id: z.number().int(),
  date: z.number().int().optional(),
  chat: chatSchema,
  from: userSchema.optional(),
  text: z.string().optional(),
  caption: z.string().optional(),
  document: documentSchema.optional()
}).passthrough()

export const callbackQuerySchema = z.object({
  id: z.string(),
  from: userSchema,
  message: messageSchema.optional(),
  inline_message_id: z.string().optional(),
  chat_instance: z.string().optional(),
  data: z.string().optional(),
  game_short_name: z.string().optional()
})

export const updateSchema = z.object({
  update_id: z.number().int(),
  message: messageSchema.optional(),
  edited_message: messageSchema.optional(),
  channel_post: messageSchema.optional(),
  edited_channel_post: messageSchema.optional(),
  callback_query: callbackQuerySchema.optional()
}).passthrough()

export type User = z.infer<typeof userSchema>
export type Chat = z.infer<typeof chatSchema>
export type Document = z.infer<typeof documentSchema>
export type Message = z.infer<typeof messageSchema>
export type CallbackQuery = z.infer<typeof callbackQuerySchema>
export type Update = z.infer<typeof updateSchema>

/**
 * Returns the message-like payload of an update. Channel posts win over
 * edits, and edits win over plain messages; nested messages (such as the one
 * attached to a callback query) are not considered.
 */
export function extractMessage(update: Update): Message | undefined {
  return update.channel_post
    ?? update.edited_channel_post
    ?? update.edited_message
    ?? update.message
}

export function extractText(update: Update): string | undefined {
  return extractMessage(update)?.text
}
