import type { Logger } from '../logger.js'
import type { StageClient } from '../client/client.js'
import type { UpdateSource } from '../updates/dispatcher.js'
import type { Update } from '../updates/types.js'

export type StepName = string

export type StepHandler<T> = (stage: StageHandle<T>) => void | Promise<void>
export type ResponseAwaiter = (update: Update) => void | Promise<void>
export type StartHook = () => void | Promise<void>
export type ExitHook<T> = (context: T) => void | Promise<void>

export interface StepDefinition<T> {
  name: StepName
  handler: StepHandler<T>
  initial?: boolean
}

export interface StepOptions {
  initial?: boolean
}

export interface StageScope {
  chatId?: number
  userId?: number
}

export type StageState =
  | { status: 'inactive' }
  | {
      status: 'active'
      firstRun: boolean
      currentStep?: StepName
      awaiter?: ResponseAwaiter
    }

/**
 * What a step handler sees of its stage.
 */
export interface StageHandle<T> {
  readonly client: StageClient
  readonly chatId: number | undefined
  readonly userId: number | undefined
  readonly active: boolean
  readonly currentStep: StepName | undefined
  context: T
  awaitResponse(awaiter: ResponseAwaiter): void
  transition(step: StepName): Promise<void>
  exit(): Promise<void>
}

export interface Stage<T> extends StageHandle<T> {
  readonly initialStep: StepName | undefined
  readonly historyEnabled: boolean
  readonly history: readonly Update[]
  on(step: StepName, handler: StepHandler<T>, options?: StepOptions): Stage<T>
  onStart(hook: StartHook): Stage<T>
  onExit(hook: ExitHook<T>): Stage<T>
  start(): Promise<Stage<T>>
}

export interface StageOptions<T> extends StageScope {
  client: StageClient
  updates: UpdateSource
  context: T
  /** Record accepted updates. Defaults to true. */
  history?: boolean
  /** Dispatcher group for the stage's subscription. Defaults to a unique group. */
  group?: string
  steps?: StepDefinition<T>[]
  logger?: Logger
}
