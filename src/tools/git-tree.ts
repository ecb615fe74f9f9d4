import {execa} from 'execa'
import {resolve} from 'node:path'
import {GitRootNotFoundError} from '../core/errors.js'
import {listWorkspaceFiles} from './filesystem.js'

/** Newline-delimited project file listing fed into the system prompt. */
export interface TreeSource {
  getTree(): Promise<string>
}

export async function getGitRoot(cwd: string): Promise<string> {
  const {stdout, stderr, exitCode} = await execa('git', ['rev-parse', '--show-toplevel'], {cwd, reject: false})
  const root = stdout.trim()
  if (exitCode !== 0 || !root) {
    throw new GitRootNotFoundError(cwd, stderr.trim() || undefined)
  }

  return root
}

export async function resolveProjectRoot(workspace: string): Promise<string> {
  try {
    return await getGitRoot(workspace)
  } catch (error) {
    if (error instanceof GitRootNotFoundError) return resolve(workspace)
    throw error
  }
}

export class GitTree implements TreeSource {
  readonly root: string

  constructor(root: string) {
    this.root = root
  }

  async getTree(): Promise<string> {
    const {stdout, exitCode} = await execa('git', ['ls-files', '--cached', '--others', '--exclude-standard'], {
      cwd: this.root,
      reject: false
    })

    // Outside a work tree (or without git) fall back to walking the directory.
    const files =
      exitCode === 0
        ? stdout
            .split('\n')
            .map((line) => line.trim())
            .filter(Boolean)
        : await listWorkspaceFiles(this.root)

    return [...new Set(files)].sort().join('\n')
  }
}
