import {Command, Flags} from '@oclif/core'
import {createInterface} from 'node:readline/promises'
import {stdin as stdIn, stdout as stdOut} from 'node:process'
import {loadConfig, maskSecret} from '../config/load-config.js'
import type {AppConfig} from '../config/schema.js'
import {closeAgentRuntime, createAgentRuntime, runAgentTurn, type AgentRuntime} from '../core/agent.js'
import {InMemoryEventBus} from '../core/event-bus.js'
import type {AgentEvent} from '../core/events.js'
import {errorMessage} from '../core/errors.js'
import {contentToString} from '../core/messages.js'
import {cyan, red, shorten} from '../ui/event-line.js'
import {attachTrace} from '../ui/trace.js'

const CHAT_COMMANDS = ['/help', '/exit', '/quit', '/clear', '/history', '/config', '/session']

function printHelp(log: (line: string) => void): void {
  log(cyan('chat commands:'))
  log(cyan('  /help                    show this help'))
  log(cyan('  /exit or /quit           exit chat'))
  log(cyan('  /clear                   clear current session history'))
  log(cyan('  /history [n]             show recent messages (default 20)'))
  log(cyan('  /config                  print resolved config'))
  log(cyan('  /session                 show session id, message count and token estimate'))
}

function createCompleter() {
  return (line: string): [string[], string] => {
    if (!line.startsWith('/')) return [[], line]
    const hits = CHAT_COMMANDS.filter((command) => command.startsWith(line))
    return [hits.length > 0 ? hits : CHAT_COMMANDS, line]
  }
}

function parseCount(input: string, fallback: number): number {
  const maybeCount = Number.parseInt(input.split(/\s+/)[1] ?? String(fallback), 10)
  return Number.isFinite(maybeCount) && maybeCount > 0 ? maybeCount : fallback
}

function printableConfig(config: AppConfig): string {
  return JSON.stringify({...config, apiKey: maskSecret(config.apiKey)}, null, 2)
}

export default class Chat extends Command {
  static override description = 'Interactive chat with the coding assistant'

  static override flags = {
    quiet: Flags.boolean({description: 'hide execution logs and show only assistant responses'}),
    debug: Flags.boolean({description: 'show timing debug info'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Chat)
    const config = await loadConfig()
    const rl = createInterface({input: stdIn, output: stdOut, completer: createCompleter()})
    const bus = new InMemoryEventBus<AgentEvent>((error, event) => {
      this.warn(`subscriber failed on ${event.type}: ${errorMessage(error)}`)
    })
    const trace = attachTrace(bus, (line) => this.log(line), {quiet: flags.quiet, debug: flags.debug})
    let runtime: AgentRuntime | undefined

    try {
      runtime = await createAgentRuntime(config, {bus})
      this.log(cyan('codeloom chat started. Type /help for commands.'))

      while (true) {
        let input = ''
        try {
          input = (await rl.question(cyan('you> '))).trim()
        } catch {
          this.log(cyan('\nInterrupted. Type /exit to quit.'))
          continue
        }

        if (!input) continue
        if (input === '/exit' || input === '/quit') break

        if (input === '/help') {
          printHelp((line) => this.log(line))
          continue
        }

        if (input === '/clear') {
          runtime.session.clear()
          this.log(cyan('session cleared'))
          continue
        }

        if (input.startsWith('/history')) {
          const messages = runtime.session.messages.slice(-parseCount(input, 20))
          if (messages.length === 0) {
            this.log(cyan('(history empty)'))
            continue
          }

          for (const message of messages) {
            this.log(`${message.role}> ${shorten(contentToString(message.content), 300)}`)
          }
          continue
        }

        if (input === '/config') {
          this.log(printableConfig(config))
          continue
        }

        if (input === '/session') {
          const {session} = runtime
          this.log(
            cyan(
              `session: ${session.id} messages: ${session.messages.length} tokens: ${session.estimateTokens()}/${session.maxTokens}`
            )
          )
          continue
        }

        if (input.startsWith('/')) {
          this.log(red(`unknown command: ${input}`))
          this.log(cyan('type /help to see supported commands'))
          continue
        }

        try {
          const output = await runAgentTurn(runtime, input)
          this.log(cyan('assistant>'))
          this.log(output)
        } catch (error) {
          // History is already rolled back.
          this.log(red(errorMessage(error)))
        }
      }
    } finally {
      if (runtime) closeAgentRuntime(runtime)
      await trace.close()
      rl.close()
    }
  }
}
