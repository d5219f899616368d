import {describe, it, expect} from 'vitest'
import {
  ArrC, Kind, NO_FILL, asInt, asNat, asNumber, compareValues, fromExternal, fromRows, maxShape,
  padIndices, rowOf, toExternal, unifyKinds, valuesEqual, type FillContext,
} from '../tk-array.mjs'
import {RuntimeCode, RuntimeError} from '../tk-errors.mjs'
import {show} from '../tk-show.mjs'

let zeroFill: FillContext = {numFill: () => 0, charFill: () => ' ', boxFill: () => ArrC.empty()}

function runtimeFail(f: () => unknown): RuntimeError {
  try { f() }
  catch (e) { if (e instanceof RuntimeError) return e; throw e }
  throw new Error('expected a runtime error') }

describe('copy on write', () => {
  it('shares storage until one holder writes', () => {
    let a = ArrC.list([1, 2, 3])
    let b = a.share()
    expect(a.refs).toBe(2)
    b.mutData()[0] = 9
    expect(Array.from(a.data)).toEqual([1, 2, 3])
    expect(Array.from(b.data)).toEqual([9, 2, 3])
    expect(a.refs).toBe(1)
    expect(b.refs).toBe(1)
  })

  it('writes in place when the storage is unique', () => {
    let a = ArrC.list([1, 2])
    let d = a.mutData()
    d[1] = 5
    expect(a.data).toBe(d)
  })

  it('counts a released handle once', () => {
    let a = ArrC.list([1])
    let c = a.share()
    c.release()
    c.release()
    expect(a.refs).toBe(1)
  })

  it('reshapes over the same storage', () => {
    let a = ArrC.list([1, 2, 3, 4])
    let m = a.reshaped([2, 2])
    expect(m.shape).toEqual([2, 2])
    expect(m.refs).toBe(2)
    expect(show(m)).toBe('[[1 2] [3 4]]')
  })

  it('refuses a shape that does not fit the data', () => {
    expect(() => ArrC.num([2], [1, 2, 3])).toThrow('array shape [2] does not fit 3 elements')
  })
})

describe('rows', () => {
  it('stacks equal rows', () => {
    let v = fromRows([ArrC.list([1, 2]), ArrC.list([3, 4])], NO_FILL)
    expect(v.shape).toEqual([2, 2])
    expect(show(v)).toBe('[[1 2] [3 4]]')
  })

  it('widens bytes mixed with numbers', () => {
    let v = fromRows([ArrC.bool(true), ArrC.scalar(2.5)], NO_FILL)
    expect(v.kind).toBe(Kind.NUM)
    expect(show(v)).toBe('[1 2.5]')
  })

  it('gives an empty list for no rows', () => {
    expect(fromRows([], NO_FILL).shape).toEqual([0])
  })

  it('rejects ragged rows without a fill', () => {
    let e = runtimeFail(() => fromRows([ArrC.list([1, 2]), ArrC.list([3])], NO_FILL))
    expect(e.code).toBe(RuntimeCode.SHAPE_MISMATCH)
    expect(e.message).toBe('array: rows must have the same shape: shapes [2] and [1] do not match')
    expect(e.operands).toEqual([{kind: Kind.NUM, shape: [2]}, {kind: Kind.NUM, shape: [1]}])
  })

  it('pads ragged rows under a fill', () => {
    expect(show(fromRows([ArrC.list([1, 2]), ArrC.list([3])], zeroFill))).toBe('[[1 2] [3 0]]')
  })

  it('will not mix characters and numbers', () => {
    let e = runtimeFail(() => unifyKinds([ArrC.scalar(1), ArrC.chr('a')], 'join'))
    expect(e.code).toBe(RuntimeCode.TYPE_MISMATCH)
    expect(e.message).toBe('join: cannot combine number and character arrays')
  })

  it('takes a row, or the scalar itself', () => {
    expect(show(rowOf(ArrC.list([4, 5]), 1))).toBe('5')
    expect(show(rowOf(ArrC.scalar(7), 0))).toBe('7')
  })
})

describe('padding', () => {
  it('maps padded cells to -1', () => {
    expect(Array.from(padIndices([2], [3]))).toEqual([0, 1, -1])
    expect(Array.from(padIndices([1, 2], [2, 2]))).toEqual([0, 1, -1, -1])
  })

  it('promotes ranks before taking the maximum', () => {
    expect(maxShape([[2], [1, 3]])).toEqual([1, 3])
  })
})

describe('ordering', () => {
  it('orders numbers before characters before boxes', () => {
    expect(compareValues(ArrC.list([1, 2]), ArrC.list([1, 3]))).toBe(-1)
    expect(compareValues(ArrC.scalar(9), ArrC.chr('a'))).toBe(-1)
    expect(compareValues(ArrC.boxed(ArrC.scalar(0)), ArrC.chr('a'))).toBe(1)
  })

  it('puts NaN above every number', () => {
    expect(compareValues(ArrC.scalar(NaN), ArrC.scalar(Infinity))).toBe(1)
    expect(valuesEqual(ArrC.scalar(NaN), ArrC.scalar(NaN))).toBe(true)
  })

  it('breaks ties on length', () => {
    expect(compareValues(ArrC.list([1, 2]), ArrC.list([1, 2, 3]))).toBe(-1)
  })

  it('treats bytes and numbers of equal value as equal', () => {
    expect(valuesEqual(ArrC.bool(true), ArrC.scalar(1))).toBe(true)
  })
})

describe('scalar readers', () => {
  it('names the operand in its messages', () => {
    expect(runtimeFail(() => asNat(ArrC.scalar(-1), 'take count')).message)
      .toBe('take count must be a natural number, but it is -1')
    expect(runtimeFail(() => asInt(ArrC.scalar(1.5), 'rotation')).message)
      .toBe('rotation must be an integer, but it is 1.5')
    expect(runtimeFail(() => asNumber(ArrC.list([1, 2]), 'index')).message)
      .toBe('index must be a single number')
  })

  it('accepts a one-element list', () => {
    expect(asNat(ArrC.list([3]), 'n')).toBe(3)
  })
})

describe('external values', () => {
  it('exports kind, shape and elements', () => {
    expect(toExternal(ArrC.str('hi'))).toEqual({kind: 'char', shape: [2], elements: ['h', 'i']})
    expect(toExternal(ArrC.boxed(ArrC.bool(false))))
      .toEqual({kind: 'box', shape: [], elements: [{kind: 'byte', shape: [], elements: [0]}]})
  })

  it('imports nested values', () => {
    let v = fromExternal({kind: 'box', shape: [2], elements: [
      {kind: 'number', shape: [2], elements: [1, 2]},
      {kind: 'char', shape: [1], elements: ['x']}]})
    expect(show(v)).toBe('{[1 2] "x"}')
  })

  it('rejects malformed values', () => {
    expect(() => fromExternal({kind: 'number', shape: [2], elements: [1]}))
      .toThrow('shape [2] does not fit 1 elements')
    expect(() => fromExternal({kind: 'number', shape: [-1], elements: []})).toThrow('bad shape [-1]')
    expect(() => fromExternal({kind: 'byte', shape: [1], elements: [300]}))
      .toThrow('byte elements must be integers 0..255')
    expect(() => fromExternal({kind: 'char', shape: [1], elements: ['ab']}))
      .toThrow('char elements must be single code points')
  })
})
