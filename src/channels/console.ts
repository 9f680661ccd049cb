import readline from 'node:readline'
import type { Readable, Writable } from 'node:stream'

import type { CommandHandler } from '../commands/handler.js'
import type { CallerContext, Logger } from '../core/types.js'

interface ConsoleIo {
  input: Readable
  output: Writable
}

/**
 * Local terminal front end for trying commands without a chat backend.
 *
 * Every line is treated as a message from one fixed private-chat caller.
 */
export class ConsoleChannel {
  private rl: readline.Interface | null = null
  private readonly io: ConsoleIo
  private pending: Promise<void> = Promise.resolve()

  constructor(
    private readonly handler: CommandHandler,
    private readonly caller: CallerContext,
    private readonly logger: Logger,
    io?: Partial<ConsoleIo>
  ) {
    this.io = {
      input: io?.input ?? process.stdin,
      output: io?.output ?? process.stdout
    }
  }

  /** Starts reading lines; resolves once input closes. */
  async start(): Promise<void> {
    const rl = readline.createInterface({
      input: this.io.input,
      output: this.io.output,
      prompt: 'you> '
    })
    this.rl = rl

    const closed = new Promise<void>((resolve) =>
      rl.once('close', () => {
        this.rl = null
        resolve()
      })
    )
    rl.on('line', (line) => {
      // Lines are handled strictly in order
      this.pending = this.pending.then(() => this.handleLine(line))
    })

    this.io.output.write('Console channel ready. Type a command such as /help.\n')
    rl.prompt()
    this.logger.info('channel.console.start')

    await closed
    await this.pending
    this.logger.info('channel.console.closed')
  }

  stop(): void {
    this.rl?.close()
    this.rl = null
  }

  /** Runs one line through the handler and prints the reply, if any. */
  async handleLine(raw: string): Promise<void> {
    const content = raw.trim()
    if (content) {
      try {
        const reply = await this.handler.execute(content, this.caller)
        if (reply) this.io.output.write(`bot> ${reply.content}\n`)
      } catch (error) {
        this.logger.error('channel.console.failed', {
          error: error instanceof Error ? error.message : String(error)
        })
        this.io.output.write('bot> Something went wrong.\n')
      }
    }
    this.rl?.prompt()
  }
}
