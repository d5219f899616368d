// array values: a shape plus copy-on-write element storage of a single kind
import {RtE} from './tk-errors.mjs'

export enum Kind {
  BYTE = 'byte',   // 0..255, what comparisons produce
  NUM = 'num',     // double precision
  CHAR = 'char',   // one code point per element
  BOX = 'box',     // a nested value
}

export type Buffers = {
  [Kind.BYTE]: Uint8Array
  [Kind.NUM]: Float64Array
  [Kind.CHAR]: string[]
  [Kind.BOX]: Value[]
}

type Store<B> = { data: B, refs: number }

/** One counted reference to element storage that other arrays may also hold. */
export class Cow<B> {
  private live = true
  private constructor(private store: Store<B>, private readonly copy: (b: B) => B) {}

  static of<B>(data: B, copy: (b: B) => B): Cow<B> {
    return new Cow({data, refs: 1}, copy) }

  get data(): B { return this.store.data }
  get refs(): number { return this.store.refs }
  get unique(): boolean { return this.store.refs === 1 }

  share(): Cow<B> {
    this.store.refs++
    return new Cow(this.store, this.copy) }

  release(): void {
    if (!this.live) return
    this.live = false
    this.store.refs-- }

  /** storage safe to write through: copied first whenever another reference can see it */
  writable(): B {
    if (this.store.refs > 1) {
      this.store.refs--
      this.store = {data: this.copy(this.store.data), refs: 1} }
    return this.store.data }}

export let product = (shape: readonly number[]): number => shape.reduce((a, b) => a * b, 1)
export let shapeEq = (a: readonly number[], b: readonly number[]): boolean =>
  a.length === b.length && a.every((x, i) => x === b[i])
export let formatShape = (s: readonly number[]): string => `[${s.join(' ')}]`

export class Arr<K extends Kind = Kind> {
  constructor(readonly kind: K, readonly shape: readonly number[], private readonly cow: Cow<Buffers[K]>) {
    if (product(shape) !== cow.data.length)
      throw new Error(`array shape ${formatShape(shape)} does not fit ${cow.data.length} elements`) }

  get data(): Buffers[K] { return this.cow.data }
  get rank(): number { return this.shape.length }
  get flatLen(): number { return this.cow.data.length }
  get rowCount(): number { return this.shape.length ? this.shape[0] : 1 }
  get rowShape(): number[] { return this.shape.slice(1) }
  get rowLen(): number { return product(this.shape.slice(1)) }
  get isScalar(): boolean { return this.shape.length === 0 }
  get refs(): number { return this.cow.refs }

  share(): Arr<K> { return new Arr(this.kind, this.shape, this.cow.share()) }
  release(): void { this.cow.release() }

  /** same elements under another shape of equal size; storage is shared */
  reshaped(shape: readonly number[]): Arr<K> { return new Arr(this.kind, shape, this.cow.share()) }

  /** element storage for in-place updates, detached from other holders first */
  mutData(): Buffers[K] { return this.cow.writable() }}

export type Value = Arr<Kind.BYTE> | Arr<Kind.NUM> | Arr<Kind.CHAR> | Arr<Kind.BOX>
export type NumericArr = Arr<Kind.BYTE> | Arr<Kind.NUM>

/** Constructors for array values */
export const ArrC = {
  num(shape: readonly number[], data: Float64Array | readonly number[]): Arr<Kind.NUM> {
    let buf = data instanceof Float64Array ? data : Float64Array.from(data)
    return new Arr(Kind.NUM, shape, Cow.of(buf, (b: Float64Array) => b.slice())) },
  byte(shape: readonly number[], data: Uint8Array | readonly number[]): Arr<Kind.BYTE> {
    let buf = data instanceof Uint8Array ? data : Uint8Array.from(data)
    return new Arr(Kind.BYTE, shape, Cow.of(buf, (b: Uint8Array) => b.slice())) },
  char(shape: readonly number[], data: string[]): Arr<Kind.CHAR> {
    return new Arr(Kind.CHAR, shape, Cow.of(data, (b: string[]) => b.slice())) },
  box(shape: readonly number[], data: Value[]): Arr<Kind.BOX> {
    return new Arr(Kind.BOX, shape, Cow.of(data, (b: Value[]) => b.slice())) },
  scalar: (x: number) => ArrC.num([], [x]),
  bool: (b: boolean) => ArrC.byte([], [b ? 1 : 0]),
  chr: (c: string) => ArrC.char([], [c]),
  boxed: (v: Value) => ArrC.box([], [v]),
  str(s: string): Arr<Kind.CHAR> { let cs = Array.from(s); return ArrC.char([cs.length], cs) },
  list: (xs: readonly number[]) => ArrC.num([xs.length], xs),
  empty: () => ArrC.num([0], []),
}

export const ArrQ = {
  isNumeric(v: Value): v is NumericArr { return v.kind === Kind.BYTE || v.kind === Kind.NUM },
  isChar(v: Value): v is Arr<Kind.CHAR> { return v.kind === Kind.CHAR },
  isBox(v: Value): v is Arr<Kind.BOX> { return v.kind === Kind.BOX },
}

export let isByteValue = (x: number): boolean => Number.isInteger(x) && x >= 0 && x <= 255

export let kindName = (k: Kind): string =>
  k === Kind.CHAR ? 'character' : k === Kind.BOX ? 'box' : 'number'

/** numbers as doubles; bytes are widened */
export function toNum(v: NumericArr): Arr<Kind.NUM> {
  return v.kind === Kind.NUM ? v : ArrC.num(v.shape, Float64Array.from(v.data)) }

// ---- fill

/** where padding elements come from while fill is active */
export interface FillContext {
  numFill(): number | undefined
  charFill(): string | undefined
  boxFill(): Value | undefined
}

export const NO_FILL: FillContext = {
  numFill: () => undefined, charFill: () => undefined, boxFill: () => undefined }

export function hasFill(kind: Kind, fill: FillContext): boolean {
  switch (kind) {
    case Kind.BYTE: case Kind.NUM: return fill.numFill() !== undefined
    case Kind.CHAR: return fill.charFill() !== undefined
    case Kind.BOX: return fill.boxFill() !== undefined }}

// ---- gathering and slicing

/**
 * A new array of `shape` whose element k is v's flat element idx[k].
 * Negative indices take the fill element; callers check hasFill first.
 */
export function gather(v: Value, idx: ArrayLike<number>, shape: readonly number[], fill: FillContext = NO_FILL): Value {
  let n = idx.length, padded = false
  for (let k = 0; k < n; k++) if (idx[k] < 0) { padded = true; break }
  let missing = () => new Error(`gather: no ${kindName(v.kind)} fill`)
  switch (v.kind) {
    case Kind.BYTE: case Kind.NUM: {
      let f = padded ? fill.numFill() : 0
      if (f === undefined) throw missing()
      let src = v.data
      if (v.kind === Kind.BYTE && isByteValue(f)) {
        let out = new Uint8Array(n)
        for (let k = 0; k < n; k++) out[k] = idx[k] < 0 ? f : src[idx[k]]
        return ArrC.byte(shape, out) }
      let out = new Float64Array(n)
      for (let k = 0; k < n; k++) out[k] = idx[k] < 0 ? f : src[idx[k]]
      return ArrC.num(shape, out) }
    case Kind.CHAR: {
      let f = padded ? fill.charFill() : ''
      if (f === undefined) throw missing()
      let src = v.data, out = new Array<string>(n)
      for (let k = 0; k < n; k++) out[k] = idx[k] < 0 ? f : src[idx[k]]
      return ArrC.char(shape, out) }
    case Kind.BOX: {
      let f = padded ? fill.boxFill() : ArrC.empty()
      if (f === undefined) throw missing()
      let src = v.data, out = new Array<Value>(n)
      for (let k = 0; k < n; k++) out[k] = idx[k] < 0 ? f : src[idx[k]]
      return ArrC.box(shape, out) }}}

/** flat elements [from, to) as a new array of `shape` */
export function sliceFlat(v: Value, from: number, to: number, shape: readonly number[]): Value {
  switch (v.kind) {
    case Kind.BYTE: return ArrC.byte(shape, v.data.slice(from, to))
    case Kind.NUM: return ArrC.num(shape, v.data.slice(from, to))
    case Kind.CHAR: return ArrC.char(shape, v.data.slice(from, to))
    case Kind.BOX: return ArrC.box(shape, v.data.slice(from, to)) }}

/** row i of v; a scalar's only row is itself */
export function rowOf(v: Value, i: number): Value {
  if (v.isScalar) return v.share()
  let len = v.rowLen
  return sliceFlat(v, i * len, (i + 1) * len, v.rowShape) }

export function rows(v: Value): Value[] {
  let out: Value[] = []
  for (let i = 0; i < v.rowCount; i++) out.push(rowOf(v, i))
  return out }

/** element i of v as a scalar, unwrapping nothing */
export let elemOf = (v: Value, i: number): Value => sliceFlat(v, i, i + 1, [])

// ---- kinds

/** bring values to one common kind: bytes widen to numbers when mixed with numbers */
export function unifyKinds(vs: Value[], what: string): Value[] {
  if (vs.length === 0) return vs
  let k0 = vs[0].kind
  if (vs.every(v => v.kind === k0)) return vs
  if (vs.every(ArrQ.isNumeric)) return vs.map(v => ArrQ.isNumeric(v) ? toNum(v) : v)
  let other = vs.find(v => v.kind !== k0) ?? vs[0]
  throw RtE.type(`${what}: cannot combine ${kindName(k0)} and ${kindName(other.kind)} arrays`, vs[0], other) }

/** flat concatenation of values that already share a kind */
export function concatFlat(vs: Value[], shape: readonly number[]): Value {
  let n = vs.reduce((a, v) => a + v.flatLen, 0)
  let first = vs[0]
  if (first === undefined) return ArrC.num(shape, [])
  switch (first.kind) {
    case Kind.BYTE: case Kind.NUM: {
      let allByte = vs.every(v => v.kind === Kind.BYTE)
      let out = allByte ? new Uint8Array(n) : new Float64Array(n), at = 0
      for (let v of vs) if (ArrQ.isNumeric(v)) { out.set(v.data, at); at += v.flatLen }
      return out instanceof Uint8Array ? ArrC.byte(shape, out) : ArrC.num(shape, out) }
    case Kind.CHAR: {
      let out: string[] = []
      for (let v of vs) if (ArrQ.isChar(v)) for (let c of v.data) out.push(c)
      return ArrC.char(shape, out) }
    case Kind.BOX: {
      let out: Value[] = []
      for (let v of vs) if (ArrQ.isBox(v)) for (let x of v.data) out.push(x)
      return ArrC.box(shape, out) }}}

// ---- padding

/** shape with leading 1s up to `rank` */
export let promoteShape = (s: readonly number[], rank: number): number[] =>
  [...new Array<number>(Math.max(0, rank - s.length)).fill(1), ...s]

/** flat source index for each element of `dst`, -1 outside `src` (equal ranks) */
export function padIndices(src: readonly number[], dst: readonly number[]): Int32Array {
  let n = product(dst), out = new Int32Array(n), r = dst.length
  let ix = new Array<number>(r).fill(0)
  for (let k = 0; k < n; k++) {
    let j = 0, inside = true
    for (let d = 0; d < r; d++) {
      if (ix[d] >= src[d]) { inside = false; break }
      j = j * src[d] + ix[d] }
    out[k] = inside ? j : -1
    for (let d = r - 1; d >= 0; d--) {
      if (++ix[d] < dst[d]) break
      ix[d] = 0 }}
  return out }

/** v padded with fill elements up to `shape` (rank promoted first) */
export function padTo(v: Value, shape: readonly number[], fill: FillContext): Value {
  let src = promoteShape(v.shape, shape.length)
  if (shapeEq(src, shape)) return v.reshaped(shape)
  return gather(v, padIndices(src, shape), shape, fill) }

/** elementwise maximum of shapes after rank promotion */
export function maxShape(shapes: ReadonlyArray<readonly number[]>): number[] {
  let r = shapes.reduce((x, s) => Math.max(x, s.length), 0)
  let out = new Array<number>(r).fill(0)
  for (let s of shapes) promoteShape(s, r).forEach((x, d) => { out[d] = Math.max(out[d], x) })
  return out }

/**
 * Stack values as the rows of a new array, row 0 first.
 * Rows of differing shape are padded under fill; otherwise that is a ShapeMismatch.
 */
export function fromRows(vs: Value[], fill: FillContext, what = 'array'): Value {
  if (vs.length === 0) return ArrC.empty()
  let parts = unifyKinds(vs, what)
  let rowShape = parts[0].shape
  if (!parts.every(v => shapeEq(v.shape, rowShape))) {
    let bad = parts.find(v => !shapeEq(v.shape, rowShape)) ?? parts[0]
    if (!hasFill(parts[0].kind, fill)) throw RtE.shapes(`${what}: rows must have the same shape`, parts[0], bad)
    rowShape = maxShape(parts.map(v => v.shape))
    parts = parts.map(v => padTo(v, rowShape, fill)) }
  return concatFlat(parts, [parts.length, ...rowShape]) }

// ---- ordering

let kindRank = (k: Kind) => k === Kind.CHAR ? 1 : k === Kind.BOX ? 2 : 0

/** numbers ascending with NaN above everything and equal to itself */
export function cmpNum(x: number, y: number): number {
  if (x === y) return 0
  if (Number.isNaN(x)) return Number.isNaN(y) ? 0 : 1
  if (Number.isNaN(y)) return -1
  return x < y ? -1 : 1 }

let cmpChar = (x: string, y: string) => cmpNum(x.codePointAt(0) ?? 0, y.codePointAt(0) ?? 0)

/** total order on elements: numbers < characters < boxes */
export function compareElems(a: Value, i: number, b: Value, j: number): number {
  if (ArrQ.isNumeric(a) && ArrQ.isNumeric(b)) return cmpNum(a.data[i], b.data[j])
  if (a.kind === Kind.CHAR && b.kind === Kind.CHAR) return cmpChar(a.data[i], b.data[j])
  if (a.kind === Kind.BOX && b.kind === Kind.BOX) return compareValues(a.data[i], b.data[j])
  return Math.sign(kindRank(a.kind) - kindRank(b.kind)) }

/** total order on whole values: elements first, then element count, then shape */
export function compareValues(a: Value, b: Value): number {
  let n = Math.min(a.flatLen, b.flatLen)
  for (let i = 0; i < n; i++) {
    let c = compareElems(a, i, b, i)
    if (c !== 0) return c }
  if (a.flatLen !== b.flatLen) return a.flatLen < b.flatLen ? -1 : 1
  if (a.rank !== b.rank) return a.rank < b.rank ? -1 : 1
  for (let d = 0; d < a.rank; d++)
    if (a.shape[d] !== b.shape[d]) return a.shape[d] < b.shape[d] ? -1 : 1
  if (a.flatLen === 0 && a.kind !== b.kind) return Math.sign(kindRank(a.kind) - kindRank(b.kind))
  return 0 }

export let valuesEqual = (a: Value, b: Value): boolean => compareValues(a, b) === 0

/** compare row i of a with row j of b (both with row length `len`) */
export function compareRows(a: Value, i: number, b: Value, j: number, len: number): number {
  for (let k = 0; k < len; k++) {
    let c = compareElems(a, i * len + k, b, j * len + k)
    if (c !== 0) return c }
  return 0 }

// ---- scalar and list readers

/** the single number of a numeric scalar (or one-element array) */
export function asNumber(v: Value, what: string): number {
  if (!ArrQ.isNumeric(v) || v.flatLen !== 1 || v.rank > 1)
    throw RtE.type(`${what} must be a single number`, v)
  return v.data[0] }

export function asInt(v: Value, what: string): number {
  let x = asNumber(v, what)
  if (!Number.isInteger(x)) throw RtE.type(`${what} must be an integer, but it is ${x}`, v)
  return x }

export function asNat(v: Value, what: string): number {
  let x = asInt(v, what)
  if (x < 0) throw RtE.type(`${what} must be a natural number, but it is ${x}`, v)
  return x }

export function asIntList(v: Value, what: string): number[] {
  if (!ArrQ.isNumeric(v) || v.rank > 1) throw RtE.type(`${what} must be a list of integers`, v)
  let xs = Array.from(v.data)
  if (!xs.every(Number.isInteger)) throw RtE.type(`${what} must be a list of integers`, v)
  return xs }

export function asNatList(v: Value, what: string): number[] {
  let xs = asIntList(v, what)
  if (xs.some(x => x < 0)) throw RtE.type(`${what} must be a list of natural numbers`, v)
  return xs }

// ---- external representation

export type External
  = { kind: 'byte' | 'number', shape: number[], elements: number[] }
  | { kind: 'char', shape: number[], elements: string[] }
  | { kind: 'box', shape: number[], elements: External[] }

export function toExternal(v: Value): External {
  let shape = [...v.shape]
  switch (v.kind) {
    case Kind.BYTE: return {kind: 'byte', shape, elements: Array.from(v.data)}
    case Kind.NUM: return {kind: 'number', shape, elements: Array.from(v.data)}
    case Kind.CHAR: return {kind: 'char', shape, elements: [...v.data]}
    case Kind.BOX: return {kind: 'box', shape, elements: v.data.map(toExternal)} }}

/** validated import of an external value; throws TypeError when malformed */
export function fromExternal(x: External): Value {
  if (!x.shape.every(d => Number.isInteger(d) && d >= 0)) throw new TypeError(`bad shape ${formatShape(x.shape)}`)
  if (product(x.shape) !== x.elements.length)
    throw new TypeError(`shape ${formatShape(x.shape)} does not fit ${x.elements.length} elements`)
  switch (x.kind) {
    case 'byte':
      if (!x.elements.every(isByteValue)) throw new TypeError('byte elements must be integers 0..255')
      return ArrC.byte(x.shape, x.elements)
    case 'number': return ArrC.num(x.shape, x.elements)
    case 'char':
      if (!x.elements.every(c => Array.from(c).length === 1)) throw new TypeError('char elements must be single code points')
      return ArrC.char(x.shape, [...x.elements])
    case 'box': return ArrC.box(x.shape, x.elements.map(fromExternal)) }}
