import { ConsoleChannel } from '../channels/console.js'
import { setupCommands } from '../commands/setup.js'
import { loadConfig } from '../config/load.js'
import { logger } from '../core/logger.js'
import { createExampleCommands } from './commands.js'

/** Boots the example bot on the local console. */
async function main(): Promise<void> {
  const config = loadConfig()
  const owner = {
    id: process.env.CHATKIT_CONSOLE_SENDER_ID || 'local-user',
    username: process.env.CHATKIT_CONSOLE_USERNAME || 'local'
  }

  const { registry, handler } = setupCommands(config, {
    commands: createExampleCommands({ mood: 'happy' }, owner),
    logger
  })

  logger.info('startup.config', {
    botUsername: config.botUsername,
    commands: registry.toBotCommands().map((c) => c.command)
  })

  const channel = new ConsoleChannel(
    handler,
    { chatId: 'local-chat', chatType: 'private', senderId: owner.id, senderUsername: owner.username },
    logger
  )

  const shutdown = (signal: string): void => {
    logger.info('shutdown.signal', { signal })
    channel.stop()
  }
  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))

  await channel.start()
}

main().catch((error: unknown) => {
  logger.error('fatal', {
    error: error instanceof Error ? error.message : String(error)
  })
  process.exitCode = 1
})
