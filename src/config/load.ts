import { config as loadEnv } from 'dotenv'

import { configSchema, type CommandKitConfig } from './schema.js'

/** Parses comma-separated env values. */
function parseCsv(input: string | undefined): string[] | undefined {
  if (!input) return undefined
  const items = input
    .split(',')
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean)
  return items.length > 0 ? items : undefined
}

function parseBool(input: string | undefined): boolean | undefined {
  if (input === undefined || input.trim() === '') return undefined
  return input.trim().toLowerCase() === 'true'
}

/**
 * Loads runtime configuration from the environment.
 *
 * Reads a local `.env` first unless an explicit environment is passed,
 * which keeps tests independent of the process environment.
 *
 * @throws ZodError when a value is missing or invalid
 */
export function loadConfig(env?: Record<string, string | undefined>): CommandKitConfig {
  let source = env
  if (!source) {
    loadEnv()
    source = process.env
  }

  return configSchema.parse({
    botUsername: source.CHATKIT_BOT_USERNAME ?? '',
    defaultTargets: parseCsv(source.CHATKIT_DEFAULT_TARGETS),
    errors: {
      silentDenial: parseBool(source.CHATKIT_SILENT_DENIAL),
      printError: parseBool(source.CHATKIT_PRINT_ERROR)
    }
  })
}
