import {describe, it, expect} from 'vitest'
import {one, shown, failure} from './helpers.mjs'
import {compile, run, show, CaptureOutputProvider, InterruptFlag, type Program} from '../tk.mjs'
import {ArrC, Kind} from '../tk-array.mjs'
import {RuntimeCode, RuntimeError} from '../tk-errors.mjs'
import {ExecContext} from '../tk-context.mjs'
import {ScopeArena, VM} from '../tk-vm.mjs'

function program(src: string): Program {
  let p = compile(src)
  if (!p.ok) throw p.error
  return p.value }

function runtimeFailure(src: string, fill = false): RuntimeError {
  let e = failure(src, {fill})
  if (!(e instanceof RuntimeError)) throw e
  return e }

describe('run', () => {
  it('takes its arguments from the given stack', () => {
    let r = run(program('+'), [ArrC.scalar(1), ArrC.scalar(2)])
    expect(r.ok && r.value.map(show)).toEqual(['3'])
  })

  it('checks a static signature before running anything', () => {
    let output = new CaptureOutputProvider()
    let r = run(program('&p 9\n+ 1'), [], {output})
    expect(r.ok).toBe(false)
    if (r.ok) return
    expect(r.error.code).toBe(RuntimeCode.STACK_UNDERFLOW)
    expect(r.error.message).toBe('main needs 1 value but the stack has 0')
    expect(output.lines).toEqual([])
  })

  it('reports underflow found while running with the failing span', () => {
    let e = runtimeFailure('⍥; 3')
    expect(e.code).toBe(RuntimeCode.STACK_UNDERFLOW)
    expect(e.message).toBe('; needs 1 value but the stack has 0')
    expect(e.span).toEqual({start: 0, end: 2})
    expect(runtimeFailure('⍥(;) 3').message).toBe('function needs 1 value but the stack has 0')
  })

  it('checks what a modifier takes before calling it', () => {
    let e = runtimeFailure('∩+ ⍥(.) 1 5')
    expect(e.message).toBe('∩ needs 4 values but the stack has 2')
    expect(e.span).toEqual({start: 0, end: 2})
  })

  it('keeps the span of the innermost failing instruction', () => {
    let e = runtimeFailure('F ← (+ [1 2])\nF [1 2 3]')
    expect(e.span).toEqual({start: 5, end: 6})
  })

  it('never changes the caller values or the program constants', () => {
    let x = ArrC.list([1, 2])
    let r = run(program('¯'), [x])
    expect(r.ok && r.value.map(show)).toEqual(['[¯1 ¯2]'])
    expect(show(x)).toBe('[1 2]')
    let p = program('¯ . [1 2 3]')
    for (let i = 0; i < 2; i++) {
      let again = run(p, [])
      expect(again.ok && again.value.map(show)).toEqual(['[1 2 3]', '[¯1 ¯2 ¯3]']) }
  })

  it('stops when interrupted', () => {
    let interrupt = new InterruptFlag()
    interrupt.raise()
    let r = run(program('+ 1 2'), [], {interrupt})
    expect(r.ok).toBe(false)
    if (!r.ok) expect(r.error.code).toBe(RuntimeCode.INTERRUPTED)
    interrupt.clear()
    expect(run(program('+ 1 2'), [], {interrupt}).ok).toBe(true)
  })
})

describe('bindings', () => {
  it('binds values and functions', () => {
    expect(one('X ← 5\n+ X X')).toBe('10')
    expect(one('Double ← ×2\nDouble 7')).toBe('14')
    expect(one('F ← +1\n∵F [1 2]')).toBe('[2 3]')
  })

  it('sees the latest binding of a name', () => {
    expect(one('X ← 1\nX ← 2\nX')).toBe('2')
  })

  it('lets functions read names from enclosing scopes', () => {
    expect(one('X ← 1\nF ← +X\nF 5')).toBe('6')
    expect(one('Y ← 10\n∵(+Y) [1 2]')).toBe('[11 12]')
  })

  it('closes every scope it opens', () => {
    let vm = new VM(new ExecContext())
    let out = vm.main(program('F ← (X ← 1\n+X)\nF F 1'))
    expect(out.map(show)).toEqual(['3'])
    expect(vm.scopes.live).toBe(0)
  })
})

describe('ScopeArena', () => {
  it('reuses closed scopes and walks parents', () => {
    let a = new ScopeArena()
    let root = a.open(-1, 1)
    let child = a.open(root, 1)
    a.set(root, 0, {kind: 'value', v: ArrC.scalar(4)})
    let s = a.lookup(child, 1, 0)
    expect(s.kind === 'value' && show(s.v)).toBe('4')
    a.close(child)
    expect(a.open(root, 0)).toBe(child)
    expect(a.live).toBe(2)
  })

  it('releases bound values when a scope closes', () => {
    let a = new ScopeArena(), v = ArrC.scalar(1)
    let h = a.open(-1, 1)
    a.set(h, 0, {kind: 'value', v: v.share()})
    expect(v.refs).toBe(2)
    a.close(h)
    expect(v.refs).toBe(1)
  })
})

describe('arrays', () => {
  it('collects arrays of run-time length', () => {
    expect(one('[⍥(.) 2 5]')).toBe('[5 5 5]')
    expect(one('{⍥(.) 1 @a}')).toBe('{@a @a}')
  })

  it('lowers the mark when code pops below it', () => {
    expect(shown('[⍥; 2] 1 2 3')).toEqual(['3', '[]'])
  })

  it('builds boxed and empty arrays', () => {
    expect(one('{}')).toBe('{}')
    expect(one('{1 "ab"}')).toBe('{1 "ab"}')
    expect(one('[]')).toBe('[]')
  })

  it('refuses mixed kinds and ragged rows', () => {
    let e = runtimeFailure('[1 @a]')
    expect(e.code).toBe(RuntimeCode.TYPE_MISMATCH)
    expect(e.message).toBe('array: cannot combine number and character arrays')
    expect(runtimeFailure('[1 [2 3]]').code).toBe(RuntimeCode.SHAPE_MISMATCH)
  })

  it('pads ragged rows under the fill option', () => {
    expect(one('[1 [2 3]]', {fill: true})).toBe('[[1 0] [2 3]]')
  })

  it('keeps the element kind', () => {
    let r = run(program('[= 1 1 = 1 2]'), [])
    expect(r.ok && r.value[0].kind).toBe(Kind.BYTE)
  })
})
