import { extractMessage, type Update } from '../updates/types.js'
import type { StageScope } from './types.js'

export interface ScopeFilter {
  matches(update: Update, selfId: number): boolean
  contradicts(update: Update): boolean
}

export function createScopeFilter(scope: StageScope): ScopeFilter {
  const { chatId, userId } = scope

  function matches(update: Update, selfId: number): boolean {
    const message = extractMessage(update)
    if (!message) {
      return false
    }

    const senderId = message.from?.id

    // never react to our own output
    if (senderId === selfId) {
      return false
    }

    if (chatId !== undefined && message.chat.id !== chatId) {
      return false
    }

    if (userId !== undefined && senderId !== userId) {
      return false
    }

    return true
  }

  // true only when a payload is present and names another chat or user
  function contradicts(update: Update): boolean {
    const message = extractMessage(update)
    if (!message) {
      return false
    }
    if (chatId !== undefined && message.chat.id !== chatId) {
      return true
    }
    return userId !== undefined && message.from?.id !== userId
  }

  return { matches, contradicts }
}
