import { UnknownStepError } from '../errors.js'
import { createNoopLogger, type Logger } from '../logger.js'
import type { StepHandler, StepName } from './types.js'

export interface StepTable<T> {
  readonly initialStep: StepName | undefined
  register(name: StepName, handler: StepHandler<T>, initial?: boolean): void
  get(name: StepName): StepHandler<T>
  has(name: StepName): boolean
  isEmpty(): boolean
  names(): StepName[]
}

export function createStepTable<T>(logger?: Logger): StepTable<T> {
  const log = logger ?? createNoopLogger()
  const steps = new Map<StepName, StepHandler<T>>()
  let initialStep: StepName | undefined

  function register(name: StepName, handler: StepHandler<T>, initial = false): void {
    if (initial) {
      if (initialStep !== undefined) {
        log.warn({
          event: 'initial_step_redefined',
          previous: initialStep,
          step: name
        }, `The initial step was already defined as ${initialStep} and is now being redefined as ${name}`)
      }
      initialStep = name
    }
    steps.set(name, handler)
  }

  function get(name: StepName): StepHandler<T> {
    const handler = steps.get(name)
    if (!handler) {
      throw new UnknownStepError(name)
    }
    return handler
  }

  function has(name: StepName): boolean {
    return steps.has(name)
  }

  function isEmpty(): boolean {
    return steps.size === 0
  }

  function names(): StepName[] {
    return [...steps.keys()]
  }

  return {
    get initialStep() {
      return initialStep
    },
    register,
    get,
    has,
    isEmpty,
    names
  }
}
