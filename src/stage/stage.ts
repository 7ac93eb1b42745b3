import { NoStepsDefinedError, StageStateError } from '../errors.js'
import { createNoopLogger } from '../logger.js'
import { matchAll, type Subscription } from '../updates/dispatcher.js'
import type { Update } from '../updates/types.js'
import { createScopeFilter } from './scope-filter.js'
import { createStepTable } from './step-table.js'
import type {
  ExitHook,
  ResponseAwaiter,
  Stage,
  StageOptions,
  StageState,
  StartHook,
  StepHandler,
  StepName,
  StepOptions
} from './types.js'

/**
 * Creates a stage: a set of named steps bound to one chat and/or user,
 * driven by the updates of `options.updates` once started.
 *
 * The first update the stage sees after `start` is the one that led to it
 * being started (or whatever arrives first). It is recorded but never handed
 * to a step.
 */
export function createStage<T>(options: StageOptions<T>): Stage<T> {
  const { client, updates, chatId, userId, group } = options
  const log = options.logger ?? createNoopLogger()
  const historyEnabled = options.history ?? true

  const steps = createStepTable<T>(log)
  const scopeFilter = createScopeFilter({ chatId, userId })
  const updateHistory: Update[] = []
  const startHooks: StartHook[] = []
  const exitHooks: ExitHook<T>[] = []

  let context = options.context
  let state: StageState = { status: 'inactive' }
  let subscription: Subscription | undefined

  for (const step of options.steps ?? []) {
    steps.register(step.name, step.handler, step.initial)
  }

  function record(update: Update): void {
    if (historyEnabled) {
      updateHistory.push(update)
    }
  }

  function on(step: StepName, handler: StepHandler<T>, stepOptions: StepOptions = {}): Stage<T> {
    steps.register(step, handler, stepOptions.initial)
    return stage
  }

  function onStart(hook: StartHook): Stage<T> {
    startHooks.push(hook)
    return stage
  }

  function onExit(hook: ExitHook<T>): Stage<T> {
    exitHooks.push(hook)
    return stage
  }

  function awaitResponse(awaiter: ResponseAwaiter): void {
    const current = state
    if (current.status !== 'active') {
      log.warn({ event: 'await_response_ignored', chatId, userId, reason: 'inactive' })
      return
    }
    current.awaiter = awaiter
  }

  async function transition(step: StepName): Promise<void> {
    const handler = steps.get(step)
    const current = state
    if (current.status !== 'active') {
      throw new StageStateError(`Cannot transition to ${step} while the stage is inactive`, 'inactive')
    }

    current.currentStep = step
    current.awaiter = undefined
    log.debug({ event: 'stage_transition', step, chatId, userId })

    await handler(stage)
  }

  async function handleUpdate(update: Update): Promise<void> {
    const current = state
    if (current.status !== 'active') {
      return
    }

    if (current.firstRun) {
      current.firstRun = false
      if (!scopeFilter.contradicts(update)) {
        record(update)
      }
      log.debug({ event: 'stage_first_update_consumed', updateId: update.update_id, chatId, userId })
      return
    }

    const awaiter = current.awaiter
    if (!awaiter) {
      return
    }

    if (!scopeFilter.matches(update, client.bot.id)) {
      log.debug({ event: 'update_out_of_scope', updateId: update.update_id, chatId, userId })
      return
    }

    current.awaiter = undefined
    record(update)
    await awaiter(update)
  }

  async function start(): Promise<Stage<T>> {
    if (steps.isEmpty()) {
      throw new NoStepsDefinedError()
    }
    if (state.status === 'active') {
      throw new StageStateError('Stage is already active', 'active')
    }

    state = { status: 'active', firstRun: true }
    subscription = updates.subscribe(matchAll, handleUpdate, { group })
    log.info({ event: 'stage_started', chatId, userId, initialStep: steps.initialStep })

    for (const hook of startHooks) {
      await hook()
    }

    const initialStep = steps.initialStep
    if (initialStep !== undefined && state.status === 'active') {
      await transition(initialStep)
    }

    return stage
  }

  async function exit(): Promise<void> {
    const current = state
    if (current.status !== 'active') {
      log.debug({ event: 'stage_exit_ignored', chatId, userId })
      return
    }

    state = { status: 'inactive' }
    if (subscription) {
      updates.unsubscribe(subscription)
      subscription = undefined
    }
    log.info({ event: 'stage_exited', chatId, userId, lastStep: current.currentStep })

    for (const hook of exitHooks) {
      await hook(context)
    }
  }

  const stage: Stage<T> = {
    client,
    chatId,
    userId,
    historyEnabled,
    get active() {
      return state.status === 'active'
    },
    get currentStep() {
      return state.status === 'active' ? state.currentStep : undefined
    },
    get initialStep() {
      return steps.initialStep
    },
    get history() {
      return [...updateHistory]
    },
    get context() {
      return context
    },
    set context(value: T) {
      context = value
    },
    on,
    onStart,
    onExit,
    awaitResponse,
    transition,
    start,
    exit
  }

  return stage
}

export function enterStage<T>(options: StageOptions<T>): Promise<Stage<T>> {
  return createStage(options).start()
}
