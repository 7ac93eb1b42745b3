import { describe, it, expect, vi } from 'vitest'
import { UnknownStepError } from '../../src/errors.js'
import { createStepTable } from '../../src/stage/step-table.js'
import { createMockLogger } from '../mocks/updates.js'

describe('StepTable', () => {
  it('should start empty without an initial step', () => {
    const table = createStepTable<null>()

    expect(table.isEmpty()).toBe(true)
    expect(table.initialStep).toBeUndefined()
    expect(table.names()).toEqual([])
  })

  it('should keep steps in registration order', () => {
    const table = createStepTable<null>()

    table.register('welcome', vi.fn())
    table.register('ask', vi.fn())
    table.register('done', vi.fn())

    expect(table.isEmpty()).toBe(false)
    expect(table.names()).toEqual(['welcome', 'ask', 'done'])
  })

  it('should overwrite the handler of a re-registered step', () => {
    const table = createStepTable<null>()
    const first = vi.fn()
    const second = vi.fn()

    table.register('ask', first)
    table.register('ask', second)

    expect(table.get('ask')).toBe(second)
    expect(table.names()).toEqual(['ask'])
  })

  it('should throw UnknownStepError for missing steps', () => {
    const table = createStepTable<null>()

    expect(() => table.get('missing')).toThrow(UnknownStepError)
    expect(table.has('missing')).toBe(false)
  })

  it('should set the initial step without warning the first time', () => {
    const logger = createMockLogger()
    const table = createStepTable<null>(logger)

    table.register('welcome', vi.fn(), true)

    expect(table.initialStep).toBe('welcome')
    expect(logger.warn).not.toHaveBeenCalled()
  })

  it('should warn when the initial step is redefined and keep the last one', () => {
    const logger = createMockLogger()
    const table = createStepTable<null>(logger)

    table.register('B', vi.fn(), true)
    table.register('A', vi.fn(), true)

    expect(table.initialStep).toBe('A')
    expect(logger.warn).toHaveBeenCalledTimes(1)
    expect(logger.warn).toHaveBeenCalledWith(
      { event: 'initial_step_redefined', previous: 'B', step: 'A' },
      'The initial step was already defined as B and is now being redefined as A'
    )
  })

  it('should leave the initial step alone for non-initial registrations', () => {
    const table = createStepTable<null>()

    table.register('welcome', vi.fn(), true)
    table.register('ask', vi.fn())

    expect(table.initialStep).toBe('welcome')
  })
})
