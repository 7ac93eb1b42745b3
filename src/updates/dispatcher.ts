import { createNoopLogger, type Logger } from '../logger.js'
import type { Update } from './types.js'

export type UpdatePredicate = (update: Update) => boolean
export type UpdateHandler = (update: Update) => void | Promise<void>

export interface SubscribeOptions {
  group?: string
}

export interface Subscription {
  readonly id: number
  readonly group: string
}

export interface UpdateSource {
  subscribe(predicate: UpdatePredicate, handler: UpdateHandler, options?: SubscribeOptions): Subscription
  unsubscribe(subscription: Subscription): boolean
}

export interface UpdateDispatcher extends UpdateSource {
  dispatch(update: Update): Promise<void>
  subscriptionCount(): number
}

interface Entry {
  subscription: Subscription
  predicate: UpdatePredicate
  handler: UpdateHandler
}

export const matchAll: UpdatePredicate = () => true

/**
 * In-process update source. Updates are delivered one at a time: a call to
 * `dispatch` resolves only after every handler of every earlier call has
 * settled. Handlers must not await `dispatch` themselves.
 *
 * Subscriptions are visited in insertion order. One added while an update is
 * being delivered still receives that update, and one removed before its
 * turn does not. Only the first matching handler of a group runs per update.
 */
export function createUpdateDispatcher(logger?: Logger): UpdateDispatcher {
  const log = logger ?? createNoopLogger()
  const entries = new Map<number, Entry>()
  let nextId = 1
  let tail: Promise<void> = Promise.resolve()

  function subscribe(predicate: UpdatePredicate, handler: UpdateHandler, options: SubscribeOptions = {}): Subscription {
    const id = nextId++
    const subscription: Subscription = { id, group: options.group ?? `subscription-${id}` }
    entries.set(id, { subscription, predicate, handler })
    log.debug({ event: 'update_subscribed', id, group: subscription.group })
    return subscription
  }

  function unsubscribe(subscription: Subscription): boolean {
    const removed = entries.delete(subscription.id)
    if (removed) {
      log.debug({ event: 'update_unsubscribed', id: subscription.id, group: subscription.group })
    }
    return removed
  }

  async function deliver(update: Update): Promise<void> {
    const handledGroups = new Set<string>()

    // Map iteration picks up entries inserted during the loop
    for (const entry of entries.values()) {
      const { subscription } = entry
      if (handledGroups.has(subscription.group)) {
        continue
      }

      try {
        if (!entry.predicate(update)) {
          continue
        }
        handledGroups.add(subscription.group)
        await entry.handler(update)
      } catch (err) {
        log.error({
          event: 'update_handler_failed',
          updateId: update.update_id,
          subscriptionId: subscription.id,
          group: subscription.group,
          error: err
        })
      }
    }
  }

  function dispatch(update: Update): Promise<void> {
    const run = tail.then(() => deliver(update))
    tail = run
    return run
  }

  function subscriptionCount(): number {
    return entries.size
  }

  return { subscribe, unsubscribe, dispatch, subscriptionCount }
}
