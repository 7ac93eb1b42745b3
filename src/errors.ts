export class ConfigError extends Error {
  readonly name = 'ConfigError'

  constructor(message: string, public readonly field?: string) {
    super(message)
  }
}

export class MessagesError extends Error {
  readonly name = 'MessagesError'

  constructor(message: string, public readonly key?: string) {
    super(message)
  }
}

export class UpdateError extends Error {
  readonly name = 'UpdateError'

  constructor(message: string, public readonly field?: string) {
    super(message)
  }
}

export class NoStepsDefinedError extends Error {
  readonly name = 'NoStepsDefinedError'

  constructor(message = 'No steps defined for this stage') {
    super(message)
  }
}

export class UnknownStepError extends Error {
  readonly name = 'UnknownStepError'

  constructor(public readonly step: string) {
    super(`Unknown step: ${step}`)
  }
}

export type StageStatus = 'active' | 'inactive'

export class StageStateError extends Error {
  readonly name = 'StageStateError'

  constructor(message: string, public readonly status: StageStatus) {
    super(message)
  }
}
