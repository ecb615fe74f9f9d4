import {mkdir, opendir, readFile, writeFile} from 'node:fs/promises'
import {dirname, relative, resolve, sep} from 'node:path'

const SKIPPED_DIRECTORIES = new Set(['.git', 'node_modules'])

export function resolveWorkspacePath(workspace: string, inputPath: string): string {
  const workspaceRoot = resolve(workspace)
  const fullPath = resolve(workspaceRoot, inputPath)
  const inWorkspace = fullPath === workspaceRoot || fullPath.startsWith(`${workspaceRoot}${sep}`)
  if (!inWorkspace) {
    throw new Error(`Path '${inputPath}' is outside the project root.`)
  }

  return fullPath
}

export async function readTextFile(fullPath: string): Promise<string> {
  return readFile(fullPath, 'utf8')
}

export async function writeTextFile(fullPath: string, content: string): Promise<void> {
  await mkdir(dirname(fullPath), {recursive: true})
  await writeFile(fullPath, content, 'utf8')
}

/** Relative file paths under `workspace`, sorted, without VCS and dependency folders. */
export async function listWorkspaceFiles(workspace: string, limit = 2000): Promise<string[]> {
  const workspaceRoot = resolve(workspace)
  const results: string[] = []

  async function walk(dirPath: string): Promise<void> {
    const dir = await opendir(dirPath)
    for await (const entry of dir) {
      if (results.length >= limit) break
      const fullPath = resolve(dirPath, entry.name)
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name)) await walk(fullPath)
        continue
      }
      results.push(relative(workspaceRoot, fullPath).split(sep).join('/'))
    }
  }

  await walk(workspaceRoot)
  return results.sort()
}
