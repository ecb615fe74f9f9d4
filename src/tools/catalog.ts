import type {ToolSpec} from '../core/messages.js'

export type ToolName = 'read_file' | 'write_file' | 'execute' | 'compile_check'

function stringTool(
  name: ToolName,
  description: string,
  fields: Record<string, string>
): ToolSpec {
  const properties: ToolSpec['parameterSchema']['properties'] = {}
  for (const [field, fieldDescription] of Object.entries(fields)) {
    properties[field] = {type: 'string', description: fieldDescription}
  }

  const spec: ToolSpec = {
    name,
    description,
    parameterSchema: {type: 'object', properties, required: Object.keys(fields)}
  }
  return Object.freeze(spec)
}

/** What the model may request. Encoded per vendor by each provider. */
export const TOOL_CATALOG: readonly ToolSpec[] = Object.freeze([
  stringTool('read_file', 'Read file as string using path relative to root directory of project.', {
    path: 'The file path relative to the project root directory'
  }),
  stringTool('write_file', 'Write string to file at path relative to root directory of project.', {
    path: 'The file path relative to the project root directory',
    content: 'The content to write to the file'
  }),
  stringTool('execute', 'Execute bash statements as a single string.', {
    statement: 'The bash statement to be executed.'
  }),
  stringTool('compile_check', 'Check if project compiles or runs without error.', {
    cmd: 'The command to check for compiler/interpreter errors.'
  })
])

export function isToolName(name: string): name is ToolName {
  return TOOL_CATALOG.some((tool) => tool.name === name)
}
