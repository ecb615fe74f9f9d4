import {describe, expect, it} from 'vitest'
import {contentToString, textOf, toolUsesOf, type ContentItem} from '../src/core/messages.js'
import {bpeTokenizer, countTokens} from '../src/core/tokenizer.js'
import {TOOL_CATALOG, isToolName} from '../src/tools/catalog.js'

describe('tool catalog', () => {
  it('exposes the four tools with string parameters', () => {
    expect(TOOL_CATALOG.map((tool) => [tool.name, tool.parameterSchema.required])).toEqual([
      ['read_file', ['path']],
      ['write_file', ['path', 'content']],
      ['execute', ['statement']],
      ['compile_check', ['cmd']]
    ])
    expect(TOOL_CATALOG[1].parameterSchema.properties.content).toEqual({
      type: 'string',
      description: 'The content to write to the file'
    })
    expect(Object.isFrozen(TOOL_CATALOG)).toBe(true)
  })

  it('recognises catalog names only', () => {
    expect(isToolName('compile_check')).toBe(true)
    expect(isToolName('frobnicate')).toBe(false)
  })
})

describe('content helpers', () => {
  const content: ContentItem[] = [
    {type: 'text', text: 'checking'},
    {type: 'tool_use', id: 't1', name: 'execute', input: {statement: 'ls'}},
    {type: 'tool_result', toolUseId: 't0', content: 'a.txt'},
    {type: 'text', text: 'again'}
  ]

  it('flattens every item into one line', () => {
    expect(contentToString(content)).toBe('checking tool execute with input: {"statement":"ls"} tool result: a.txt again')
  })

  it('selects text and tool uses', () => {
    expect(textOf(content)).toBe('checking\nagain')
    expect(toolUsesOf(content)).toEqual([{type: 'tool_use', id: 't1', name: 'execute', input: {statement: 'ls'}}])
  })
})

describe('bpeTokenizer', () => {
  it('counts subword tokens', () => {
    expect(countTokens(bpeTokenizer, 'hello world')).toBe(2)
    expect(countTokens(bpeTokenizer, '')).toBe(0)
  })
})
