import { createNoopLogger, type Logger } from '../logger.js'
import { matchAll, type UpdateSource } from '../updates/dispatcher.js'
import { extractMessage, type Update } from '../updates/types.js'
import type { Stage, StageScope } from './types.js'

export type StageFactory<T> = (scope: StageScope) => Stage<T>

export interface StageRegistryDeps {
  updates: UpdateSource
  timeoutMs: number
  logger?: Logger
}

export interface StageRegistry<T> {
  enter(scope: StageScope, factory: StageFactory<T>): Promise<Stage<T>>
  get(scope: StageScope): Stage<T> | undefined
  size(): number
  cleanup(): Promise<number>
  startCleanup(intervalMs: number): () => void
  exitAll(): Promise<void>
  dispose(): void
}

interface TrackedStage<T> {
  stage: Stage<T>
  createdAt: number
  expiresAt: number
}

const ANY = '*'

export function stageKey(scope: StageScope): string {
  return `${scope.chatId ?? ANY}:${scope.userId ?? ANY}`
}

/**
 * Keeps at most one running stage per scope and exits the ones that have not
 * seen an in-scope update for `timeoutMs`.
 */
export function createStageRegistry<T>(deps: StageRegistryDeps): StageRegistry<T> {
  const { updates, timeoutMs } = deps
  const logger = deps.logger ?? createNoopLogger()
  const stages = new Map<string, TrackedStage<T>>()

  function touch(key: string): void {
    const tracked = stages.get(key)
    if (tracked) {
      tracked.expiresAt = Date.now() + timeoutMs
    }
  }

  function trackActivity(update: Update): void {
    const message = extractMessage(update)
    if (!message) {
      return
    }
    const chatId = message.chat.id
    const userId = message.from?.id

    touch(stageKey({ chatId, userId }))
    touch(stageKey({ chatId }))
    if (userId !== undefined) {
      touch(stageKey({ userId }))
    }
  }

  const activity = updates.subscribe(matchAll, trackActivity, { group: 'stage-registry' })

  function get(scope: StageScope): Stage<T> | undefined {
    return stages.get(stageKey(scope))?.stage
  }

  async function enter(scope: StageScope, factory: StageFactory<T>): Promise<Stage<T>> {
    const key = stageKey(scope)
    const existing = stages.get(key)
    if (existing?.stage.active) {
      logger.info({ event: 'stage_already_running', key, step: existing.stage.currentStep })
      return existing.stage
    }

    const stage = factory(scope)
    const now = Date.now()
    const tracked: TrackedStage<T> = { stage, createdAt: now, expiresAt: now + timeoutMs }
    stages.set(key, tracked)

    stage.onExit(() => {
      if (stages.get(key) === tracked) {
        stages.delete(key)
        logger.info({ event: 'stage_released', key })
      }
    })

    try {
      await stage.start()
    } catch (err) {
      if (stages.get(key) === tracked) {
        stages.delete(key)
      }
      if (stage.active) {
        await stage.exit()
      }
      logger.error({ event: 'stage_start_failed', key, error: err })
      throw err
    }

    logger.info({ event: 'stage_entered', key, step: stage.currentStep })
    return stage
  }

  async function cleanup(): Promise<number> {
    const now = Date.now()
    const expired: [string, TrackedStage<T>][] = []
    for (const [key, tracked] of stages) {
      if (now > tracked.expiresAt) {
        expired.push([key, tracked])
      }
    }

    for (const [key, tracked] of expired) {
      logger.info({ event: 'stage_expired', key, step: tracked.stage.currentStep, ageMs: now - tracked.createdAt })
      stages.delete(key)
      await tracked.stage.exit()
    }

    return expired.length
  }

  function startCleanup(intervalMs: number): () => void {
    const timer = setInterval(() => {
      cleanup().catch(err => {
        logger.error({ event: 'stage_cleanup_failed', error: err })
      })
    }, intervalMs)
    timer.unref()

    return () => clearInterval(timer)
  }

  async function exitAll(): Promise<void> {
    const tracked = [...stages.values()]
    stages.clear()
    for (const { stage } of tracked) {
      try {
        await stage.exit()
      } catch (err) {
        logger.error({ event: 'stage_exit_failed', chatId: stage.chatId, userId: stage.userId, error: err })
      }
    }
  }

  function dispose(): void {
    updates.unsubscribe(activity)
  }

  function size(): number {
    return stages.size
  }

  return { enter, get, size, cleanup, startCleanup, exitAll, dispose }
}
