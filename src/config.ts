import { z } from 'zod'
import type { FlagConfig } from './types.ts'
import { ConfigurationError } from './errors.ts'

function blankAsUnset(value: unknown): unknown {
  return value === '' ? undefined : value
}

const FlagEnvSchema = z.object({
  /** The default flag storage driver. */
  FLAG_DRIVER: z.string().min(1).default('database'),
  DATABASE_URL: z.preprocess(blankAsUnset, z.string().url().optional()),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
})

export interface AppConfig {
  flag: FlagConfig
  logLevel: string
}

/**
 * Read flag configuration from environment variables. Nothing loads a `.env`
 * file; export the variables in the shell or the process manager.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = FlagEnvSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`Invalid flag configuration (${problems.join('; ')})`)
  }

  const { FLAG_DRIVER, DATABASE_URL, LOG_LEVEL } = parsed.data
  return {
    flag: {
      default: FLAG_DRIVER,
      drivers: {
        database: {
          driver: 'database',
          url: DATABASE_URL,
        },

        array: {
          driver: 'array',
        },
      },
    },
    logLevel: LOG_LEVEL,
  }
}
