// pervasive application of scalar functions over arrays
import {
  ArrC, ArrQ, Kind, type Value, type FillContext,
  elemOf, hasFill, kindName, padTo, product, shapeEq,
} from './tk-array.mjs'
import {RtE} from './tk-errors.mjs'
import {MONADIC, type MonadicName, type DyadicName} from './tk-kernels.mjs'
import {type KernelPool, runMonadic, runDyadic} from './tk-pool.mjs'

export interface PervadeEnv {
  fill: FillContext
  pool: KernelPool | null
  poll(): void
}

const GLYPH: Record<DyadicName, string> = {
  eq: '=', ne: '≠', lt: '<', le: '≤', gt: '>', ge: '≥', add: '+', sub: '-', mul: '×',
  div: '÷', mod: '◿', pow: 'ⁿ', log: 'ₙ', min: '↧', max: '↥', atan: '∠' }

const COMPARISON = new Set<DyadicName>(['eq', 'ne', 'lt', 'le', 'gt', 'ge'])

// integer-valued and never negative on 0..255
const KEEPS_BYTES = new Set<MonadicName>(['sign', 'floor', 'ceil', 'round'])

// a numeric view of an operand: numbers as they are, characters as code points
type View = { data: ArrayLike<number>, chars: boolean }

function view(v: Value): View {
  switch (v.kind) {
    case Kind.BYTE: case Kind.NUM: return {data: v.data, chars: false}
    case Kind.CHAR: return {data: Float64Array.from(v.data, c => c.codePointAt(0) ?? 0), chars: true}
    case Kind.BOX: throw new Error('view of a box array') }}

function toChars(xs: Float64Array, shape: readonly number[], ...operands: Value[]): Value {
  let out = new Array<string>(xs.length)
  for (let i = 0; i < xs.length; i++) {
    let x = xs[i]
    if (!Number.isInteger(x) || x < 0 || x > 0x10ffff)
      throw RtE.type(`character code ${x} is out of range`, ...operands)
    out[i] = String.fromCodePoint(x) }
  return ArrC.char(shape, out) }

let asBytes = (xs: Float64Array, shape: readonly number[]) => ArrC.byte(shape, Uint8Array.from(xs))

// element i of v for recursion into boxes: the boxed value itself, or a scalar
let inner = (v: Value, i: number): Value => v.kind === Kind.BOX ? v.data[i].share() : elemOf(v, i)

// ---- monadic

export function monadic(kernel: MonadicName, glyph: string, v: Value, env: PervadeEnv): Value {
  if (v.kind === Kind.BOX) {
    let out: Value[] = []
    for (let i = 0; i < v.flatLen; i++) out.push(monadic(kernel, glyph, v.data[i].share(), env))
    return ArrC.box(v.shape, out) }
  if (!ArrQ.isNumeric(v)) throw RtE.type(`cannot ${glyph} a ${kindName(v.kind)} array`, v)
  let n = v.flatLen, pool = env.pool
  if (v.kind === Kind.BYTE && KEEPS_BYTES.has(kernel)) {
    let data = v.mutData(), f = MONADIC[kernel]
    for (let i = 0; i < n; i++) data[i] = f(data[i])
    return v }
  if (pool && n >= pool.threshold) {
    let r = pool.monadic(kernel, v.data, env.poll)
    if (r) return ArrC.num(v.shape, r) }
  if (v.kind === Kind.NUM) {
    // in place: mutData detaches the storage first when it is shared
    let data = v.mutData()
    runMonadic(kernel, data, data)
    return v }
  return ArrC.num(v.shape, runMonadic(kernel, v.data, new Float64Array(n))) }

// ---- dyadic

type Aligned = { a: Value, b: Value, shape: readonly number[], ra: number, rb: number }

/** prefix broadcasting, with fill padding of both operands when their prefixes disagree */
export function align(a: Value, b: Value, what: string, fill: FillContext): Aligned {
  if (!shapeEq(a.shape, b.shape)) {
    let r = Math.min(a.rank, b.rank)
    let agree = a.shape.slice(0, r).every((d, i) => d === b.shape[i])
    if (!agree) {
      if (!hasFill(a.kind, fill) || !hasFill(b.kind, fill))
        throw RtE.shapes(`cannot ${what} arrays`, a, b)
      let prefix = a.shape.slice(0, r).map((d, i) => Math.max(d, b.shape[i]))
      a = padTo(a, [...prefix, ...a.shape.slice(r)], fill)
      b = padTo(b, [...prefix, ...b.shape.slice(r)], fill) }}
  let shape = a.rank >= b.rank ? a.shape : b.shape
  return {a, b, shape, ra: product(shape.slice(a.rank)), rb: product(shape.slice(b.rank))} }

type Out = 'num' | 'byte' | 'char'

function outKind(kernel: DyadicName, a: Value, b: Value): Out {
  let ca = a.kind === Kind.CHAR, cb = b.kind === Kind.CHAR
  if (COMPARISON.has(kernel)) return 'byte'
  if (!ca && !cb) return 'num'
  switch (kernel) {
    case 'add': if (ca !== cb) return 'char'; break
    case 'sub': if (cb) return ca ? 'num' : 'char'; break
    case 'min': case 'max': if (ca && cb) return 'char'; break }
  throw RtE.type(`cannot ${GLYPH[kernel]} ${kindName(b.kind)} and ${kindName(a.kind)}`, a, b) }

/** kernel applied to a (top of stack) and b, elementwise with broadcasting */
export function dyadic(kernel: DyadicName, a: Value, b: Value, env: PervadeEnv): Value {
  let al = align(a, b, GLYPH[kernel], env.fill)
  let n = product(al.shape)
  a = al.a; b = al.b
  if (a.kind === Kind.BOX || b.kind === Kind.BOX) {
    let out: Value[] = []
    for (let i = 0; i < n; i++)
      out.push(dyadic(kernel, inner(a, Math.floor(i / al.ra)), inner(b, Math.floor(i / al.rb)), env))
    return ArrC.box(al.shape, out) }
  let kind = outKind(kernel, a, b)
  let va = view(a), vb = view(b)
  if (va.chars !== vb.chars && COMPARISON.has(kernel)) return mixedComparison(kernel, a, b, al.shape)
  if (kernel === 'mod') {
    for (let i = 0; i < va.data.length; i++) if (va.data[i] === 0) throw RtE.divZero(a, b) }
  let pool = env.pool, res: Float64Array | null = null
  if (pool && n >= pool.threshold) res = pool.dyadic(kernel, va.data, al.ra, vb.data, al.rb, n, env.poll)
  if (!res) {
    // write over a full-size number operand in place when we own it
    let target = kind === 'num' && a.kind === Kind.NUM && al.ra === 1 ? a
               : kind === 'num' && b.kind === Kind.NUM && al.rb === 1 ? b : null
    if (target) {
      let data = target.mutData()
      runDyadic(kernel, target === a ? data : va.data, al.ra, target === b ? data : vb.data, al.rb, data)
      return target.reshaped(al.shape) }
    res = runDyadic(kernel, va.data, al.ra, vb.data, al.rb, new Float64Array(n)) }
  switch (kind) {
    case 'num': return ArrC.num(al.shape, res)
    case 'byte': return asBytes(res, al.shape)
    case 'char': return toChars(res, al.shape, a, b) }}

// numbers sort before characters, so comparisons across the two are decided by kind alone
function mixedComparison(kernel: DyadicName, a: Value, b: Value, shape: readonly number[]): Value {
  let c = b.kind === Kind.CHAR ? 1 : -1   // sign of (b compared to a)
  let r = kernel === 'eq' ? 0 : kernel === 'ne' ? 1
        : kernel === 'lt' || kernel === 'le' ? (c < 0 ? 1 : 0) : (c > 0 ? 1 : 0)
  return ArrC.byte(shape, new Uint8Array(product(shape)).fill(r)) }
