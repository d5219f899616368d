// structural primitives: shape queries, indexing, rearrangement, search
import {
  ArrC, ArrQ, Kind, NO_FILL, type Value, type FillContext,
  asInt, asIntList, asNat, asNatList, compareRows, concatFlat, formatShape, fromRows,
  gather, hasFill, kindName, maxShape, padTo, product, rowOf, rows, shapeEq, sliceFlat,
  unifyKinds, valuesEqual,
} from './tk-array.mjs'
import {RtE} from './tk-errors.mjs'

/** a scalar acts as a one-row list where an operation needs rows */
let asList = (v: Value): Value => v.isScalar ? v.reshaped([1]) : v

let iota = (n: number, f: (i: number) => number = i => i): number[] => Array.from({length: n}, (_, i) => f(i))

/** advance a multi-index over `dims`, last axis fastest */
function step(ix: number[], dims: readonly number[]) {
  for (let d = dims.length - 1; d >= 0; d--) {
    if (++ix[d] < dims[d]) return
    ix[d] = 0 }}

/**
 * Gather along leading axes: lists[d][j] is the source position for output
 * position j on axis d, or -1 for a fill element. Later axes are kept whole.
 */
function axesGather(v: Value, lists: number[][], fill: FillContext): Value {
  let src = v.shape, r = src.length
  let dims = src.map((d, i) => i < lists.length ? lists[i].length : d)
  let strides = new Array<number>(r)
  for (let d = r - 1, s = 1; d >= 0; s *= src[d], d--) strides[d] = s
  let n = product(dims), idx = new Int32Array(n), ix = new Array<number>(r).fill(0)
  for (let k = 0; k < n; k++) {
    let j = 0
    for (let d = 0; d < r; d++) {
      let p = d < lists.length ? lists[d][ix[d]] : ix[d]
      if (p < 0) { j = -1; break }
      j += p * strides[d] }
    idx[k] = j
    step(ix, dims) }
  return gather(v, idx, dims, fill) }

// ---- monadic

export let length = (v: Value): Value => ArrC.scalar(v.isScalar ? 1 : v.shape[0])
export let shapeOf = (v: Value): Value => ArrC.list([...v.shape])
export let deshape = (v: Value): Value => v.reshaped([v.flatLen])
export let box = (v: Value): Value => ArrC.boxed(v.share())

export function range(v: Value): Value {
  if (v.isScalar) return ArrC.list(iota(asNat(v, 'range')))
  let dims = asNatList(v, 'range'), r = dims.length, n = product(dims)
  let out = new Float64Array(n * r), ix = new Array<number>(r).fill(0)
  for (let k = 0; k < n; k++) {
    for (let d = 0; d < r; d++) out[k * r + d] = ix[d]
    step(ix, dims) }
  return ArrC.num([...dims, r], out) }

export function first(v: Value, fill: FillContext): Value {
  if (v.isScalar) return v.share()
  if (v.shape[0] > 0) return rowOf(v, 0)
  if (!hasFill(v.kind, fill)) throw RtE.index('cannot take the first row of an empty array', v)
  return gather(v, new Int32Array(v.rowLen).fill(-1), v.rowShape, fill) }

export function reverse(v: Value): Value {
  if (v.isScalar) return v.share()
  let n = v.shape[0]
  return axesGather(v, [iota(n, i => n - 1 - i)], NO_FILL) }

/** the leading axis becomes the last */
export function transpose(v: Value): Value {
  if (v.rank < 2) return v.share()
  let d0 = v.shape[0], rest = v.rowLen, idx = new Int32Array(v.flatLen)
  for (let i = 0; i < d0; i++)
    for (let j = 0; j < rest; j++) idx[j * d0 + i] = i * rest + j
  return gather(v, idx, [...v.rowShape, d0]) }

function grade(v: Value, dir: 1 | -1, what: string): Value {
  if (v.isScalar) throw RtE.type(`cannot ${what} a scalar`, v)
  let len = v.rowLen
  let ix = iota(v.shape[0])
  ix.sort((i, j) => dir * compareRows(v, i, v, j, len) || i - j)
  return ArrC.list(ix) }

export let rise = (v: Value) => grade(v, 1, 'rise')
export let fall = (v: Value) => grade(v, -1, 'fall')

/** each index repeated by its count */
export function where(v: Value): Value {
  let counts = v.isScalar ? [asNat(v, 'where count')] : asNatList(v, 'where counts')
  let out: number[] = []
  counts.forEach((c, i) => { for (let k = 0; k < c; k++) out.push(i) })
  return ArrC.list(out) }

// for each row, the lowest index of a row equal to it
function firstEqualRow(v: Value, len: number): number[] {
  let n = v.shape[0], ix = iota(n)
  ix.sort((i, j) => compareRows(v, i, v, j, len) || i - j)
  let first = new Array<number>(n)
  ix.forEach((i, k) => {
    let prev = ix[k - 1]
    first[i] = k > 0 && compareRows(v, prev, v, i, len) === 0 ? first[prev] : i })
  return first }

/** for each row, the index of its first occurrence among the distinct rows */
export function classify(v: Value): Value {
  let u = asList(v), len = u.rowLen, n = u.shape[0]
  let first = firstEqualRow(u, len), ids = new Array<number>(n), next = 0
  let out = new Float64Array(n)
  for (let i = 0; i < n; i++) out[i] = ids[i] = first[i] === i ? next++ : ids[first[i]]
  return ArrC.num([n], out) }

export function deduplicate(v: Value): Value {
  if (v.isScalar) return v.share()
  let keep = firstEqualRow(v, v.rowLen).flatMap((f, i) => f === i ? [i] : [])
  return axesGather(v, [keep], NO_FILL) }

export function unbox(v: Value): Value {
  if (v.kind !== Kind.BOX) throw RtE.type(`cannot unbox a ${kindName(v.kind)} array`, v)
  if (!v.isScalar) throw RtE.type('unbox needs a single box', v)
  return v.data[0].share() }

// ---- dyadic: `a` is the top of the stack, `b` the value below it

export let match = (a: Value, b: Value): Value => ArrC.bool(valuesEqual(a, b))

/** a's rows followed by b's rows */
export function join(a: Value, b: Value, fill: FillContext): Value {
  [a, b] = unifyKinds([a, b], 'join')
  if (a.isScalar && b.isScalar) return concatFlat([a, b], [2])
  if (a.rank === b.rank - 1) a = a.reshaped([1, ...a.shape])
  else if (b.rank === a.rank - 1) b = b.reshaped([1, ...b.shape])
  else if (a.rank !== b.rank) throw RtE.shapes('cannot join arrays', a, b)
  let rs = a.rowShape
  if (!shapeEq(rs, b.rowShape)) {
    if (!hasFill(a.kind, fill)) throw RtE.shapes('cannot join arrays', a, b)
    rs = maxShape([a.rowShape, b.rowShape])
    a = padTo(a, [a.shape[0], ...rs], fill)
    b = padTo(b, [b.shape[0], ...rs], fill) }
  return concatFlat([a, b], [a.shape[0] + b.shape[0], ...rs]) }

export let couple = (a: Value, b: Value, fill: FillContext): Value => fromRows([a, b], fill, 'couple')

/** rows of b at the indices in a; negative indices count from the end */
export function select(a: Value, b: Value, fill: FillContext): Value {
  if (!ArrQ.isNumeric(a)) throw RtE.type(`cannot select with a ${kindName(a.kind)} array`, a)
  if (b.isScalar) throw RtE.type('cannot select from a scalar', b)
  let len = b.shape[0], rl = b.rowLen, n = a.flatLen
  let idx = new Int32Array(n * rl)
  for (let k = 0; k < n; k++) {
    let i = a.data[k]
    if (!Number.isInteger(i)) throw RtE.type(`indices must be integers, but one is ${i}`, a)
    let p = i < 0 ? i + len : i
    if (p < 0 || p >= len) {
      if (!hasFill(b.kind, fill)) throw RtE.index(`index ${i} is out of bounds of length ${len}`, a, b)
      p = -1 }
    for (let e = 0; e < rl; e++) idx[k * rl + e] = p < 0 ? -1 : p * rl + e }
  return gather(b, idx, [...a.shape, ...b.rowShape], fill) }

/** the element (or sub-array) of b at the multi-index a */
export function pick(a: Value, b: Value, fill: FillContext): Value {
  if (a.rank === 2) return fromRows(rows(a).map(r => pick(r, b, fill)), fill, 'pick')
  let ix = a.isScalar ? [asInt(a, 'pick index')] : asIntList(a, 'pick index')
  if (ix.length > b.rank) throw RtE.index(`cannot pick ${ix.length} axes from a rank ${b.rank} array`, a, b)
  let shape = b.shape.slice(ix.length), cell = product(shape)
  let off = 0, oob = false
  ix.forEach((i, d) => {
    let len = b.shape[d], p = i < 0 ? i + len : i
    if (p < 0 || p >= len) oob = true
    off = off * len + p })
  if (!oob) return sliceFlat(b, off * cell, (off + 1) * cell, shape)
  if (!hasFill(b.kind, fill))
    throw RtE.index(`index ${ix.join(' ')} is out of bounds of shape ${formatShape(b.shape)}`, a, b)
  return gather(b, new Int32Array(cell).fill(-1), shape, fill) }

/** b's elements, cycled or truncated, under the shape a */
export function reshape(a: Value, b: Value, fill: FillContext): Value {
  let shape = a.isScalar ? [asNat(a, 'reshape length')] : asNatList(a, 'reshape shape')
  let n = product(shape), m = b.flatLen
  if (n === m) return b.reshaped(shape)
  if (m === 0) {
    if (!hasFill(b.kind, fill)) throw RtE.shape(`cannot reshape an empty array to ${formatShape(shape)}`, a, b)
    return gather(b, new Int32Array(n).fill(-1), shape, fill) }
  let idx = new Int32Array(n)
  for (let k = 0; k < n; k++) idx[k] = k % m
  return gather(b, idx, shape) }

let counts = (a: Value, what: string): number[] =>
  a.isScalar ? [asInt(a, `${what} count`)] : asIntList(a, `${what} counts`)

/** first n rows (last |n| when negative), along as many axes as a has counts */
export function take(a: Value, b: Value, fill: FillContext): Value {
  let ns = counts(a, 'take'), v = asList(b)
  if (ns.length > v.rank) throw RtE.index(`cannot take along ${ns.length} axes of a rank ${v.rank} array`, a, b)
  let lists = ns.map((n, d) => {
    let len = v.shape[d], m = Math.abs(n)
    return iota(m, j => {
      let p = n >= 0 ? j : len - m + j
      return p >= 0 && p < len ? p : -1 })})
  if (lists.some(l => l.includes(-1)) && !hasFill(v.kind, fill))
    throw RtE.index(`cannot take ${ns.join(' ')} from an array of shape ${formatShape(v.shape)}`, a, b)
  return axesGather(v, lists, fill) }

export function drop(a: Value, b: Value): Value {
  let ns = counts(a, 'drop'), v = asList(b)
  if (ns.length > v.rank) throw RtE.index(`cannot drop along ${ns.length} axes of a rank ${v.rank} array`, a, b)
  let lists = ns.map((n, d) => {
    let len = v.shape[d], m = Math.min(Math.abs(n), len), start = n >= 0 ? m : 0
    return iota(len - m, j => start + j) })
  return axesGather(v, lists, NO_FILL) }

/** rows shifted left by n, wrapping around */
export function rotate(a: Value, b: Value): Value {
  if (b.isScalar) return b.share()
  let ns = counts(a, 'rotate')
  if (ns.length > b.rank) throw RtE.index(`cannot rotate along ${ns.length} axes of a rank ${b.rank} array`, a, b)
  let lists = ns.map((n, d) => {
    let len = b.shape[d]
    return iota(len, j => ((j + n) % len + len) % len) })
  return axesGather(b, lists, NO_FILL) }

/** every run of `a` consecutive rows */
export function windows(a: Value, b: Value): Value {
  let size = asNat(a, 'window size')
  if (size === 0) throw RtE.type('window size must be positive', a)
  if (b.isScalar) throw RtE.type('cannot take windows of a scalar', b)
  let len = b.shape[0], rl = b.rowLen, count = Math.max(0, len - size + 1)
  let idx = new Int32Array(count * size * rl)
  for (let w = 0; w < count; w++)
    for (let i = 0; i < size; i++)
      for (let e = 0; e < rl; e++) idx[(w * size + i) * rl + e] = (w + i) * rl + e
  return gather(b, idx, [count, size, ...b.rowShape]) }

/** each row of b repeated by its count in a */
export function keep(a: Value, b: Value): Value {
  let v = asList(b), len = v.shape[0]
  let ns = a.isScalar ? new Array<number>(len).fill(asNat(a, 'keep count')) : asNatList(a, 'keep counts')
  if (ns.length !== len) throw RtE.shape(`keep needs ${len} counts, but there are ${ns.length}`, a, b)
  let sel: number[] = []
  ns.forEach((c, i) => { for (let k = 0; k < c; k++) sel.push(i) })
  return axesGather(v, [sel], NO_FILL) }

/** marks each row of b where the rows of a start as a contiguous run */
export function find(a: Value, b: Value): Value {
  let hay = asList(b)
  let pat = a.rank === hay.rank - 1 ? a.reshaped([1, ...a.shape]) : a
  if (pat.rank !== hay.rank) throw RtE.shapes('cannot find', a, b)
  let n = hay.shape[0], m = pat.shape[0], rl = hay.rowLen
  let out = new Uint8Array(n)
  if (shapeEq(pat.rowShape, hay.rowShape))
    for (let i = 0; i + m <= n && i < n; i++) {
      let hit = 1
      for (let j = 0; j < m; j++) if (compareRows(pat, j, hay, i + j, rl) !== 0) { hit = 0; break }
      out[i] = hit }
  return ArrC.byte([n], out) }

// cells of a at the rank of b's rows, each looked up among b's rows
function cellSearch(a: Value, b: Value, what: string): { shape: number[], hits: number[], len: number } {
  let hay = asList(b), rs = hay.rowShape, cr = rs.length
  if (a.rank < cr) throw RtE.shapes(`cannot ${what}`, a, b)
  let shape = a.shape.slice(0, a.rank - cr), count = product(shape), rl = hay.rowLen
  let fits = shapeEq(a.shape.slice(a.rank - cr), rs)
  let hits = new Array<number>(count).fill(-1)
  if (fits)
    for (let k = 0; k < count; k++)
      for (let j = 0; j < hay.shape[0]; j++)
        if (compareRows(a, k, hay, j, rl) === 0) { hits[k] = j; break }
  return {shape, hits, len: hay.shape[0]} }

/** whether each cell of a is a row of b */
export function member(a: Value, b: Value): Value {
  let {shape, hits} = cellSearch(a, b, 'check membership')
  return ArrC.byte(shape, hits.map(h => h >= 0 ? 1 : 0)) }

/** index of each cell of a among b's rows, or the row count of b when absent */
export function indexOf(a: Value, b: Value): Value {
  let {shape, hits, len} = cellSearch(a, b, 'find the index')
  return ArrC.num(shape, hits.map(h => h >= 0 ? h : len)) }
