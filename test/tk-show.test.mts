import {describe, it, expect} from 'vitest'
import {show, showNum, showStack, disassemble} from '../tk-show.mjs'
import {compile, type Program} from '../tk.mjs'
import {ArrC} from '../tk-array.mjs'

function program(src: string): Program {
  let p = compile(src)
  if (!p.ok) throw p.error
  return p.value }

describe('numbers', () => {
  it('uses the high minus and infinity glyphs', () => {
    expect(showNum(-2.5)).toBe('¯2.5')
    expect(showNum(-1e-7)).toBe('¯1e¯7')
    expect(showNum(-Infinity)).toBe('¯∞')
    expect(showNum(NaN)).toBe('NaN')
  })
})

describe('values', () => {
  it('writes characters and strings with escapes', () => {
    expect(show(ArrC.chr('a'))).toBe('@a')
    expect(show(ArrC.chr(' '))).toBe('@\\s')
    expect(show(ArrC.chr('\n'))).toBe('@\\n')
    expect(show(ArrC.str('a"b\tc'))).toBe('"a\\"b\\tc"')
    expect(show(ArrC.char([2, 2], ['a', 'b', 'c', 'd']))).toBe('["ab" "cd"]')
  })

  it('nests brackets by rank', () => {
    expect(show(ArrC.bool(true))).toBe('1')
    expect(show(ArrC.num([2, 1, 2], [1, 2, 3, 4]))).toBe('[[[1 2]] [[3 4]]]')
    expect(show(ArrC.num([0, 3], []))).toBe('[]')
  })

  it('marks boxes', () => {
    expect(show(ArrC.boxed(ArrC.scalar(5)))).toBe('□5')
    expect(show(ArrC.boxed(ArrC.boxed(ArrC.scalar(1))))).toBe('□□1')
    expect(show(ArrC.box([2], [ArrC.list([1, 2]), ArrC.scalar(3)]))).toBe('{[1 2] 3}')
    expect(show(ArrC.box([2, 1], [ArrC.scalar(1), ArrC.scalar(2)]))).toBe('[{1} {2}]')
  })

  it('lists a stack bottom first', () => {
    expect(showStack([ArrC.scalar(1), ArrC.str('x')])).toBe('1\n"x"')
    expect(showStack([])).toBe('')
  })
})

describe('disassemble', () => {
  it('lists instructions with their operands', () => {
    expect(disassemble(program('+ 1 2')).split('\n')).toEqual([
      'main |0.1 slots=0',
      '   0  PUSH          2',
      '   1  PUSH          1',
      '   2  PRIM          +',
    ])
  })

  it('lists nested functions after their parent', () => {
    expect(disassemble(program('F ← +1\nF 2')).split('\n')).toEqual([
      'main |0.1 slots=1',
      '   0  BIND_FN       F [0] fn#0',
      '   1  PUSH          2',
      '   2  LOAD          F [0:0]',
      'main.0 |1.1 slots=0',
      '   0  PUSH          1',
      '   1  PRIM          +',
    ])
  })

  it('shows modifiers, branches and arrays', () => {
    expect(disassemble(program('/+ {1 2}')).split('\n')).toEqual([
      'main |0.1 slots=0',
      '   0  PUSH          2',
      '   1  PUSH          1',
      '   2  ARRAY         2 boxed',
      '   3  MOD           / +',
    ])
    let lines = disassemble(program('?(+1)(-1) 1 5')).split('\n')
    expect(lines[3]).toBe('   2  BRANCH_UNLESS →5')
    expect(lines[4]).toBe('   3  CALL          fn#0')
    expect(lines[5]).toBe('   4  BRANCH        →6')
  })

  it('marks a dynamic signature', () => {
    let lines = disassemble(program('[⍥(.) 2 5]')).split('\n')
    expect(lines[0]).toBe('main |dynamic slots=0')
    expect(lines[1]).toBe('   0  BEGIN_ARRAY')
    expect(lines[4]).toBe('   3  MOD           ⍥ fn#0')
  })
})
