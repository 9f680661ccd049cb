import { z } from 'zod'

const targetNameSchema = z.enum(['unspecified', 'self', 'other', 'any'])

/**
 * Runtime configuration schema for the command kit.
 */
export const configSchema = z.object({
  /** Username of the bot the commands run in, without `@`. */
  botUsername: z
    .string()
    .trim()
    .min(1)
    .transform((name) => (name.startsWith('@') ? name.slice(1) : name)),
  /** Targets accepted by commands that do not declare their own. */
  defaultTargets: z.array(targetNameSchema).min(1).default(['unspecified', 'self']),
  errors: z
    .object({
      silentDenial: z.boolean().default(true),
      printError: z.boolean().default(false)
    })
    .default({
      silentDenial: true,
      printError: false
    })
})

export type CommandKitConfig = z.infer<typeof configSchema>
