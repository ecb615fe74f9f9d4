import {Command, Flags} from '@oclif/core'
import {mkdir, writeFile} from 'node:fs/promises'
import {resolve} from 'node:path'
import {getCodeloomHome} from '../config/paths.js'

const ENV_EXAMPLE = [
  'CODELOOM_PROVIDER=openai',
  'CODELOOM_MODEL=',
  'CODELOOM_BASE_URL=',
  'OPENAI_API_KEY=',
  'ANTHROPIC_API_KEY=',
  'DEEPSEEK_API_KEY=',
  ''
].join('\n')

export default class Init extends Command {
  static override description = 'Initialize local project config and global codeloom home'

  static override flags = {
    force: Flags.boolean({char: 'f', description: 'overwrite existing config'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Init)
    const targetDir = process.cwd()
    const homeDir = getCodeloomHome()
    const configPath = resolve(targetDir, '.codeloomrc.json')
    const globalEnvExamplePath = resolve(homeDir, '.env.example')
    const flag = flags.force ? 'w' : 'wx'

    await mkdir(homeDir, {recursive: true})
    await writeFile(
      configPath,
      JSON.stringify({provider: 'openai', model: '', maxContext: 32000, maxOutputTokens: 8096}, null, 2) + '\n',
      {flag}
    )
    await writeFile(globalEnvExamplePath, ENV_EXAMPLE, {flag})

    this.log(`Created ${configPath}`)
    this.log(`Created ${globalEnvExamplePath}`)
  }
}
