import {homedir} from 'node:os'
import {resolve} from 'node:path'

export function getCodeloomHome(): string {
  const custom = process.env.CODELOOM_HOME?.trim()
  if (custom) return resolve(custom)
  return resolve(homedir(), '.codeloom')
}

export function getGlobalEnvPath(): string {
  return resolve(getCodeloomHome(), '.env')
}

export function getSessionsDir(homeDir = getCodeloomHome()): string {
  return resolve(homeDir, 'sessions')
}

export function getSessionLogPath(sessionId: string, homeDir = getCodeloomHome()): string {
  return resolve(getSessionsDir(homeDir), `${sessionId}.jsonl`)
}
