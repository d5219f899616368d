import {describe, it, expect} from 'vitest'
import {ev, one, shown, ext, failure} from './helpers.mjs'
import {RuntimeCode, RuntimeError} from '../tk-errors.mjs'
import {ArrC, Kind} from '../tk-array.mjs'
import {show} from '../tk-show.mjs'

function runtimeFailure(src: string): RuntimeError {
  let e = failure(src)
  if (!(e instanceof RuntimeError)) throw e
  return e }

describe('dyadic pervasion', () => {
  it('applies the top value to the one below it', () => {
    expect(one('+ 1 2')).toBe('3')
    expect(one('- 1 5')).toBe('4')
    expect(one('> 1 2')).toBe('1')
    expect(one('ⁿ 2 3')).toBe('9')
    expect(one('◿ 3 ¯1')).toBe('2')
  })

  it('broadcasts scalars and shape prefixes', () => {
    expect(one('+ [1 2 3] 5')).toBe('[6 7 8]')
    expect(one('+ [1 2] [[1 2] [3 4]]')).toBe('[[2 3] [5 6]]')
  })

  it('rejects shapes that disagree', () => {
    let e = runtimeFailure('+ [1 2] [1 2 3]')
    expect(e.code).toBe(RuntimeCode.SHAPE_MISMATCH)
    expect(e.message).toBe('cannot + arrays: shapes [2] and [3] do not match')
    expect(e.span).toEqual({start: 0, end: 1})
  })

  it('pads disagreeing shapes under fill', () => {
    expect(one('+ [1 2] [1 2 3]', {fill: true})).toBe('[2 4 3]')
  })

  it('compares into bytes', () => {
    expect(ext('= 1 1')).toEqual([{kind: 'byte', shape: [], elements: [1]}])
    expect(one('≠ [1 2] 1')).toBe('[0 1]')
  })

  it('divides by zero to infinity but refuses a zero modulus', () => {
    expect(one('÷ 0 1')).toBe('∞')
    let e = runtimeFailure('◿ 0 5')
    expect(e.code).toBe(RuntimeCode.DIVISION_BY_ZERO)
    expect(e.message).toBe('modulus by zero')
  })

  it('takes the angle of b over a', () => {
    let [v] = ext('∠ 0 1')
    expect(v.kind).toBe('number')
    expect(v.elements[0]).toBeCloseTo(Math.PI / 2)
  })
})

describe('characters', () => {
  it('offsets characters by numbers', () => {
    expect(one('+ 1 @a')).toBe('@b')
    expect(one('- 1 @c')).toBe('@b')
    expect(one('- @a @c')).toBe('2')
    expect(one('↧ @a @b')).toBe('@a')
  })

  it('refuses arithmetic that has no character meaning', () => {
    let e = runtimeFailure('- @a 1')
    expect(e.code).toBe(RuntimeCode.TYPE_MISMATCH)
    expect(e.message).toBe('cannot - number and character')
    expect(runtimeFailure('¯ @a').message).toBe('cannot ¯ a character array')
  })

  it('orders numbers below characters', () => {
    expect(one('< 1 @a')).toBe('0')
    expect(one('> 1 @a')).toBe('1')
    expect(one('= 1 @a')).toBe('0')
  })
})

describe('monadic pervasion', () => {
  it('computes elementwise', () => {
    expect(one('¬ [0 1]')).toBe('[1 0]')
    expect(one('± ¯3')).toBe('¯1')
    expect(one('⌵ ¯3')).toBe('3')
    expect(one('√ 9')).toBe('3')
    expect(one('⌊ 1.5')).toBe('1')
    expect(one('⌈ 1.5')).toBe('2')
  })

  it('rounds halves away from zero', () => {
    expect(one('⁅ 2.5')).toBe('3')
    expect(one('⁅ ¯2.5')).toBe('¯3')
  })

  it('has the other trigonometric functions by name', () => {
    expect(one('cosine 0')).toBe('1')
    expect(one('cosine π')).toBe('¯1')
    expect(one('tangent 0')).toBe('0')
    expect(one('arcsine 0')).toBe('0')
    expect(one('arccosine 1')).toBe('0')
    expect(one('arcsine 2')).toBe('NaN')
  })

  it('widens bytes to numbers', () => {
    let [v] = ev('¯ = 1 1')
    expect(v.kind).toBe(Kind.NUM)
    expect(one('¯ = 1 1')).toBe('¯1')
    expect(ev('¬ = 1 1')[0].kind).toBe(Kind.NUM)
  })

  it('keeps bytes under sign and rounding', () => {
    expect(ext('± = [1 2] [1 3]')).toEqual([{kind: 'byte', shape: [2], elements: [1, 0]}])
    for (let src of ['⌊ = 1 1', '⌈ = 1 1', '⁅ = 1 1']) expect(ev(src)[0].kind).toBe(Kind.BYTE)
  })

  it('copies shared bytes before writing them', () => {
    let b = ArrC.byte([3], Uint8Array.of(0, 5, 9))
    expect(ev('± .', {}, [b]).map(show)).toEqual(['[0 5 9]', '[0 1 1]'])
    expect(Array.from(b.data)).toEqual([0, 5, 9])
  })
})

describe('boxes', () => {
  it('reaches inside boxes', () => {
    expect(one('+ 1 {1 [2 3]}')).toBe('{2 [3 4]}')
    expect(one('¯ {1 [2 3]}')).toBe('{¯1 [¯2 ¯3]}')
  })

  it('leaves shared storage alone when it writes in place', () => {
    expect(shown('¯ . [1 2 3]')).toEqual(['[1 2 3]', '[¯1 ¯2 ¯3]'])
    expect(shown('+ 1 . [1 2]')).toEqual(['[1 2]', '[2 3]'])
  })
})
