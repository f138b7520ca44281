import readline from 'readline'
import type { MonitorControls } from '@/models'
import type { Logger } from './logger.service'
import { formatStatus } from './notification-formatter.service'

export const COMMAND_HELP = "Commands: 'restart', 'stop', 'status'"

/**
 * Reads operator commands from a line stream (stdin by default). It only
 * forwards intents and reads status; it never touches monitor state directly.
 */
export class CommandListenerService {
  private rl: readline.Interface | null = null
  private logger: Logger

  constructor(
    private controls: MonitorControls,
    logger: Logger,
    private input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout
  ) {
    this.logger = logger.child({ component: 'commands' })
  }

  start(): void {
    if (this.rl) return
    this.rl = readline.createInterface({ input: this.input, terminal: false })
    this.rl.on('line', line => {
      const reply = this.handleCommand(line)
      if (reply) this.output.write(`${reply}\n`)
    })
    this.rl.on('close', () => {
      this.logger.debug('Command input closed')
    })
    this.output.write(`${COMMAND_HELP}\n`)
  }

  handleCommand(line: string): string | null {
    const command = line.trim().toLowerCase()
    switch (command) {
      case '':
        return null
      case 'stop':
        this.logger.info('Stop command received')
        this.controls.requestStop()
        return 'Stopping monitor...'
      case 'restart':
        this.logger.info('Restart command received')
        this.controls.requestRestart()
        return 'Restarting monitor...'
      case 'status':
        return formatStatus(this.controls.status())
      default:
        return `Unknown command. ${COMMAND_HELP}`
    }
  }

  stop(): void {
    this.rl?.close()
    this.rl = null
  }
}
