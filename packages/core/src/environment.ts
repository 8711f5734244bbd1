/**
 * Process-level configuration read from environment variables.
 * @packageDocumentation
 */

import { z } from 'zod'

/**
 * Log levels understood by the logger, plus `silent`.
 * @public
 */
export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const environmentSchema = z.object({
  // Deployment label owned by the host application; only 'development' changes behaviour
  NODE_ENV: z.string().default('production'),
  MULTIMATCH_LOG_LEVEL: z.enum(LOG_LEVELS).default('silent'),
})

/**
 * @public
 */
export type Environment = z.infer<typeof environmentSchema>

let cached: Environment | null = null

/**
 * Parse environment variables into a typed configuration.
 *
 * Unset variables fall back to their defaults. `NODE_ENV` accepts any
 * value; an unrecognised log level is an error, not a silent default.
 *
 * @param source - Variables to read (defaults to `process.env`)
 * @throws Error naming the invalid variable
 *
 * @public
 */
export function parseEnvironment(source: NodeJS.ProcessEnv = process.env): Environment {
  const parsed = environmentSchema.safeParse({
    NODE_ENV: source.NODE_ENV,
    MULTIMATCH_LOG_LEVEL: source.MULTIMATCH_LOG_LEVEL?.toLowerCase(),
  })

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new Error(`Invalid environment variables: ${details}`)
  }

  return parsed.data
}

/**
 * The process environment, parsed on first access.
 *
 * @public
 */
export function environment(): Environment {
  if (cached === null) {
    cached = parseEnvironment()
  }
  return cached
}
