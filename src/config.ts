import { z } from 'zod'
import { InvalidConfigError } from './errors'

const flag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1')

export const engineConfigSchema = z.object({
  // FIFO among offers at the same price; off keeps heap order
  timePriority: flag.default(false),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
})

export type EngineConfig = z.infer<typeof engineConfigSchema>
export type EngineConfigInput = z.input<typeof engineConfigSchema>

export function parseConfig(input: unknown = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(input)
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    )
  }
  return result.data
}

export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  return parseConfig({
    timePriority: env.MATCHING_TIME_PRIORITY,
    logLevel: env.MATCHING_LOG_LEVEL,
  })
}
