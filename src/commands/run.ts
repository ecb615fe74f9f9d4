import {Args, Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'
import {closeAgentRuntime, createAgentRuntime, runAgentTurn} from '../core/agent.js'
import {InMemoryEventBus} from '../core/event-bus.js'
import type {AgentEvent} from '../core/events.js'
import {errorMessage} from '../core/errors.js'
import {attachTrace} from '../ui/trace.js'

export default class Run extends Command {
  static override description = 'Run a one-shot coding task'

  static override flags = {
    quiet: Flags.boolean({description: 'hide execution logs and print only final output'}),
    debug: Flags.boolean({description: 'show timing debug info'}),
    maxSteps: Flags.integer({description: 'maximum tool steps for this task', min: 1})
  }

  static override args = {
    task: Args.string({description: 'task prompt', required: true})
  }

  public async run(): Promise<void> {
    const {args, flags} = await this.parse(Run)
    const bus = new InMemoryEventBus<AgentEvent>((error, event) => {
      this.warn(`subscriber failed on ${event.type}: ${errorMessage(error)}`)
    })
    const trace = attachTrace(bus, (line) => this.log(line), {quiet: flags.quiet, debug: flags.debug})

    let output = ''
    try {
      const config = await loadConfig()
      const runtime = await createAgentRuntime(config, {bus})
      try {
        output = await runAgentTurn(runtime, args.task, {maxSteps: flags.maxSteps})
      } finally {
        closeAgentRuntime(runtime)
      }
    } catch (error) {
      await trace.close()
      this.error(errorMessage(error), {exit: 1})
    }

    await trace.close()
    this.log(output)
  }
}
