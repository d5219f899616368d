import {describe, it, expect} from 'vitest'
import {TOOLS, handleToolCall, describeError, describePrim, type ToolResult} from '../tk-tools.mjs'
import {compile} from '../tk.mjs'
import {findPrim} from '../tk-prims.mjs'

let textOf = (r: ToolResult): string => r.content.map(c => c.text).join('')

describe('tool list', () => {
  it('offers the four tools', () => {
    expect(TOOLS.map(t => t.name)).toEqual(['eval_tack', 'compile_tack', 'list_primitives', 'inspect_primitive'])
    expect(TOOLS[0].inputSchema.required).toEqual(['code'])
  })
})

describe('eval_tack', () => {
  it('returns the final stack', () => {
    let r = handleToolCall('eval_tack', {code: '+ 1 2'})
    expect(textOf(r)).toBe('3')
    expect(r.isError).toBeUndefined()
  })

  it('starts from the given stack', () => {
    expect(textOf(handleToolCall('eval_tack', {code: '+', stack: '1 2'}))).toBe('3')
  })

  it('puts printed lines before the stack', () => {
    expect(textOf(handleToolCall('eval_tack', {code: '&p "hi"\n5'}))).toBe('"hi"\n5')
  })

  it('reports errors with their position', () => {
    let r = handleToolCall('eval_tack', {code: '+ [1 2] [1 2 3]'})
    expect(r.isError).toBe(true)
    expect(textOf(r)).toBe('RuntimeError ShapeMismatch at 1:1: cannot + arrays: shapes [2] and [3] do not match')
    expect(textOf(handleToolCall('eval_tack', {code: '1\n foo'})))
      .toBe("CompileError UnboundName at 2:2: unknown name 'foo'")
  })

  it('reports an error in the stack code separately', () => {
    expect(textOf(handleToolCall('eval_tack', {code: '+', stack: 'foo'})))
      .toBe("stack: CompileError UnboundName at 1:1: unknown name 'foo'")
  })

  it('passes the run options through', () => {
    expect(textOf(handleToolCall('eval_tack', {code: '+ [1 2] [1 2 3]'}, {fill: true}))).toBe('[2 4 3]')
  })

  it('needs code', () => {
    let r = handleToolCall('eval_tack', {})
    expect(r.isError).toBe(true)
    expect(textOf(r)).toBe('Error: code parameter is required')
  })
})

describe('compile_tack', () => {
  it('lists bytecode', () => {
    let lines = textOf(handleToolCall('compile_tack', {code: '+ 1 2'})).split('\n')
    expect(lines[0]).toBe('main |0.1 slots=0')
    expect(lines).toHaveLength(4)
  })

  it('reports static errors', () => {
    let r = handleToolCall('compile_tack', {code: '(1'})
    expect(r.isError).toBe(true)
    expect(textOf(r)).toBe("ParseError at 1:3: expected ')', found end of input")
  })
})

describe('primitives', () => {
  it('lists every primitive', () => {
    let lines = textOf(handleToolCall('list_primitives', {})).split('\n')
    expect(lines).toHaveLength(83)
    expect(lines[0]).toBe('.\tduplicate\tstack\t|1.2')
    expect(lines).toContain('/\treduce\tmodifier\toperands 1')
    expect(lines[82]).toBe('&p\t&p\tsystem\t|1.0')
  })

  it('describes one primitive by name or spelling', () => {
    expect(textOf(handleToolCall('inspect_primitive', {primitive: 'reduce'})))
      .toBe('/ reduce\nclass: modifier\noperands: 1')
    expect(textOf(handleToolCall('inspect_primitive', {primitive: '*'})))
      .toBe('× multiply\nclass: dyadic-pervasive\nsignature: |2.1\nascii: *')
  })

  it('reports an unknown primitive', () => {
    let r = handleToolCall('inspect_primitive', {primitive: 'nope'})
    expect(r.isError).toBe(true)
    expect(textOf(r)).toBe('unknown primitive: nope')
  })

  it('formats a description', () => {
    let d = findPrim('⊃')
    expect(d && describePrim(d)).toBe('⊃ fork\nclass: modifier\noperands: 2')
  })
})

describe('errors', () => {
  it('describes a lex error', () => {
    let src = '1 $', p = compile(src)
    expect(p.ok).toBe(false)
    if (!p.ok) expect(describeError(p.error, src)).toBe("LexError UnrecognizedCharacter at 1:3: unrecognized character '$'")
  })

  it('rejects an unknown tool', () => {
    let r = handleToolCall('nope', {})
    expect(r.isError).toBe(true)
    expect(textOf(r)).toBe('Error: Unknown tool: nope')
  })
})
