import { z } from 'zod'
import { ConfigError } from './errors.js'
import { logger } from './logger.js'

const coerceBooleanFromEnvVar = (defaultValue: boolean) => z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === 'boolean') return val
    return val.toLowerCase() === 'true'
  })
  .default(defaultValue)

const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  bot: z.object({
    id: z.string({ required_error: 'BOT_ID is required' })
      .min(1, 'BOT_ID cannot be empty')
      .pipe(z.coerce.number().int().positive('BOT_ID must be a positive integer')),
    username: z.string().min(1).optional()
  }),
  webhookSecret: z.string().min(1).optional(),
  triggerCommand: z.string().min(1).default('/signup'),
  stageTimeoutMs: z.coerce.number().int().min(1000).default(300000),
  cleanupIntervalMs: z.coerce.number().int().min(1000).default(60000),
  historyEnabled: coerceBooleanFromEnvVar(true)
})

export type Config = z.infer<typeof configSchema>

function fieldToEnvVar(field: string): string {
  const mapping: Record<string, string> = {
    'port': 'PORT',
    'logLevel': 'LOG_LEVEL',
    'bot.id': 'BOT_ID',
    'bot.username': 'BOT_USERNAME',
    'webhookSecret': 'WEBHOOK_SECRET',
    'triggerCommand': 'TRIGGER_COMMAND',
    'stageTimeoutMs': 'STAGE_TIMEOUT_MS',
    'cleanupIntervalMs': 'CLEANUP_INTERVAL_MS',
    'historyEnabled': 'HISTORY_ENABLED'
  }
  return mapping[field] || field.toUpperCase()
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse({
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    bot: {
      id: env.BOT_ID,
      username: env.BOT_USERNAME
    },
    webhookSecret: env.WEBHOOK_SECRET,
    triggerCommand: env.TRIGGER_COMMAND,
    stageTimeoutMs: env.STAGE_TIMEOUT_MS,
    cleanupIntervalMs: env.CLEANUP_INTERVAL_MS,
    historyEnabled: env.HISTORY_ENABLED
  })

  if (!result.success) {
    const missingVars: string[] = []
    const errors = result.error.errors.map(e => {
      const field = e.path.join('.')
      const envVarName = fieldToEnvVar(field)
      if (e.code === 'invalid_type' && e.received === 'undefined') {
        missingVars.push(envVarName)
      }
      return { field, envVar: envVarName, message: e.message }
    })

    logger.error({ event: 'config_validation_failed', errors })

    if (missingVars.length > 0) {
      logger.error({
        event: 'missing_environment_variables',
        missing: missingVars,
        hint: 'Add these variables to your environment or .env file'
      })
    }

    const firstError = result.error.errors[0]
    const field = firstError.path.join('.')
    throw new ConfigError(firstError.message, field)
  }

  logger.info({ event: 'config_loaded', port: result.data.port, logLevel: result.data.logLevel })
  return result.data
}
