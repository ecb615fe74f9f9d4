import {MissingFieldError, WrongFieldTypeError, errorMessage} from '../core/errors.js'
import type {JsonValue, ToolUseContent} from '../core/messages.js'
import {isToolName} from './catalog.js'
import {readTextFile, resolveWorkspacePath, writeTextFile} from './filesystem.js'
import {formatProcessOutput, runShell, runShellWithTimeout} from './shell.js'

export type ToolDispatcherOptions = {
  /** Project root every path and command is resolved against. */
  root: string
  compileCheckTimeoutMs?: number
}

function describeType(value: JsonValue | undefined): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  return typeof value
}

function extractStringField(toolUse: ToolUseContent, field: string): string {
  const {input} = toolUse
  if (input === null || typeof input !== 'object' || Array.isArray(input) || !(field in input)) {
    throw new MissingFieldError(toolUse.name, field)
  }

  const value = input[field]
  if (typeof value !== 'string') {
    throw new WrongFieldTypeError(toolUse.name, field, describeType(value))
  }

  return value
}

/**
 * Runs model-requested tools against the project. Operational failures come
 * back as text for the model to read; only malformed input rejects.
 */
export class ToolDispatcher {
  readonly root: string
  private readonly compileCheckTimeoutMs: number

  constructor(options: ToolDispatcherOptions) {
    this.root = options.root
    this.compileCheckTimeoutMs = options.compileCheckTimeoutMs ?? 5_000
  }

  async dispatch(toolUse: ToolUseContent): Promise<string> {
    const {name} = toolUse
    if (!isToolName(name)) return `Unknown tool: ${name}`

    switch (name) {
      case 'read_file': {
        const path = extractStringField(toolUse, 'path')
        return this.readFile(path)
      }

      case 'write_file': {
        const path = extractStringField(toolUse, 'path')
        const content = extractStringField(toolUse, 'content')
        return this.writeFile(path, content)
      }

      case 'execute': {
        const statement = extractStringField(toolUse, 'statement')
        return formatProcessOutput(await runShell(statement, this.root))
      }

      case 'compile_check': {
        const cmd = extractStringField(toolUse, 'cmd')
        return formatProcessOutput(await runShellWithTimeout(cmd, this.root, this.compileCheckTimeoutMs))
      }
    }
  }

  private async readFile(path: string): Promise<string> {
    let fullPath = path
    try {
      fullPath = resolveWorkspacePath(this.root, path)
      return await readTextFile(fullPath)
    } catch (error) {
      return `Error reading file ${fullPath}: ${errorMessage(error)}.`
    }
  }

  private async writeFile(path: string, content: string): Promise<string> {
    let fullPath = path
    try {
      fullPath = resolveWorkspacePath(this.root, path)
      await writeTextFile(fullPath, content)
      return `Successfully wrote content to file ${fullPath}.`
    } catch (error) {
      return `Error writing to file ${fullPath}: ${errorMessage(error)}.`
    }
  }
}
