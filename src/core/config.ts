import { z } from 'zod'

export const DEFAULT_REFRESH_SAFETY_INTERVAL_MS = 30_000
export const DEFAULT_REFRESH_COUNT_ALLOWED = 5

export const logLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export const refreshLimitsSchema = z.object({
  refreshSafetyIntervalMs: z.number().int().nonnegative().default(DEFAULT_REFRESH_SAFETY_INTERVAL_MS),
  refreshCountAllowed: z.number().int().nonnegative().default(DEFAULT_REFRESH_COUNT_ALLOWED),
})

export const coordinatorConfigSchema = refreshLimitsSchema.extend({
  /**
   * Maximum number of waiters per queue while a refresh is in flight. Unlimited when omitted.
   */
  maxQueueSize: z.number().int().positive().optional(),
  logLevel: logLevelSchema.default('silent'),
})

export type CoordinatorConfig = z.infer<typeof coordinatorConfigSchema>
export type CoordinatorConfigInput = z.input<typeof coordinatorConfigSchema>
export type RefreshLimitsInput = Partial<z.infer<typeof refreshLimitsSchema>>

// A variable set to the empty string counts as unset.
function unsetWhenEmpty<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (value === '' ? undefined : value), schema)
}

const envSchema = z.object({
  AUTH_REFRESH_SAFETY_INTERVAL_MS: unsetWhenEmpty(z.coerce.number().int().nonnegative().optional()),
  AUTH_REFRESH_COUNT_ALLOWED: unsetWhenEmpty(z.coerce.number().int().nonnegative().optional()),
  AUTH_REFRESH_MAX_QUEUE_SIZE: unsetWhenEmpty(z.coerce.number().int().positive().optional()),
  AUTH_REFRESH_LOG_LEVEL: unsetWhenEmpty(logLevelSchema.optional()),
})

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CoordinatorConfigInput {
  const parsed = envSchema.parse(env)
  return {
    refreshSafetyIntervalMs: parsed.AUTH_REFRESH_SAFETY_INTERVAL_MS,
    refreshCountAllowed: parsed.AUTH_REFRESH_COUNT_ALLOWED,
    maxQueueSize: parsed.AUTH_REFRESH_MAX_QUEUE_SIZE,
    logLevel: parsed.AUTH_REFRESH_LOG_LEVEL,
  }
}

/**
 * Explicit options win over the environment; anything left unset falls back to the defaults.
 */
export function resolveConfig(input: CoordinatorConfigInput = {}, env: NodeJS.ProcessEnv = process.env): CoordinatorConfig {
  const fromEnv = loadConfigFromEnv(env)
  return coordinatorConfigSchema.parse({
    refreshSafetyIntervalMs: input.refreshSafetyIntervalMs ?? fromEnv.refreshSafetyIntervalMs,
    refreshCountAllowed: input.refreshCountAllowed ?? fromEnv.refreshCountAllowed,
    maxQueueSize: input.maxQueueSize ?? fromEnv.maxQueueSize,
    logLevel: input.logLevel ?? fromEnv.logLevel,
  })
}
