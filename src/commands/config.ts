import {Command} from '@oclif/core'
import {loadConfig, maskSecret} from '../config/load-config.js'

export default class Config extends Command {
  static override description = 'Print resolved config with the API key masked'

  public async run(): Promise<void> {
    const config = await loadConfig()
    this.log(JSON.stringify({...config, apiKey: maskSecret(config.apiKey)}, null, 2))
  }
}
