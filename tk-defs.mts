// primitive implementations: a jump table indexed by primitive id
import {
  ArrC, NO_FILL, type Value, type FillContext,
  asIntList, asNat, fromRows, hasFill, maxShape, padTo, product, rowOf, elemOf, shapeEq,
} from './tk-array.mjs'
import * as S from './tk-shape.mjs'
import {monadic, dyadic, type PervadeEnv} from './tk-pervade.mjs'
import type {MonadicName, DyadicName} from './tk-kernels.mjs'
import type {Signature} from './tk-core.mjs'
import {RtE} from './tk-errors.mjs'
import {Prim, PRIMS, primText} from './tk-prims.mjs'
import type {ExecContext} from './tk-context.mjs'
import {show} from './tk-show.mjs'

/** the VM as modifiers see it */
export interface Machine {
  readonly ctx: ExecContext
  readonly height: number
  push(v: Value): void
  pop(what: string): Value
}

/** a modifier operand, ready to run against the machine's stack */
export interface Callee {
  readonly name: string
  readonly prim: Prim | null
  readonly sig: Signature
  call(): void
}

/**
 * Functions borrow `args` (top of the stack first) and return their outputs
 * in push order. An output may be one of the args handles itself; anything
 * else kept or returned from an arg must be shared.
 */
export type PrimFn = (args: Value[], ctx: ExecContext) => Value[]
export type ModFn = (m: Machine, fs: Callee[]) => void
export type Impl = { fn: PrimFn } | { mod: ModFn }

let env = (ctx: ExecContext): PervadeEnv => ({fill: ctx, pool: ctx.pool, poll: ctx.poll})

let pv1 = (p: Prim, kernel: MonadicName): Impl =>
  ({fn: ([a], ctx) => [monadic(kernel, primText(p), a, env(ctx))]})
let pv2 = (kernel: DyadicName): Impl =>
  ({fn: ([a, b], ctx) => [dyadic(kernel, a, b, env(ctx))]})
let mon = (f: (v: Value, fill: FillContext) => Value): Impl => ({fn: ([a], ctx) => [f(a, ctx)]})
let dy = (f: (a: Value, b: Value, fill: FillContext) => Value): Impl => ({fn: ([a, b], ctx) => [f(a, b, ctx)]})
let constant = (x: number): Impl => ({fn: () => [ArrC.scalar(x)]})

// ---- modifier plumbing

let releaseAll = (vs: Value[]) => { for (let v of vs) v.release() }

/** n values off the stack, top first */
function popArgs(m: Machine, n: number, what: string): Value[] {
  let out: Value[] = []
  for (let i = 0; i < n; i++) out.push(m.pop(what))
  return out }

/** push `args` (deepest first), run f, and pop its outputs (deepest first) */
function apply(m: Machine, f: Callee, args: Value[]): Value[] {
  for (let v of args) m.push(v)
  f.call()
  let out = new Array<Value>(f.sig.outputs)
  for (let i = out.length - 1; i >= 0; i--) out[i] = m.pop(f.name)
  return out }

/** per-iteration results stacked into one array with `frame` as its leading axes */
function assemble(cells: Value[], frame: readonly number[], fill: FillContext, what: string): Value {
  let v = fromRows(cells, fill, what)
  let out = v.reshaped([...frame, ...v.shape.slice(1)])
  v.release()
  releaseAll(cells)
  return out }

// one output list per output of f
let outLists = (f: Callee): Value[][] => Array.from({length: f.sig.outputs}, () => [])

// an operator's value on zero rows
const IDENTITY = new Map<Prim, number>([
  [Prim.Add, 0], [Prim.Sub, 0], [Prim.Mul, 1], [Prim.Div, 1],
  [Prim.Max, -Infinity], [Prim.Min, Infinity],
])

// ---- modifiers

// right to left: each earlier row goes below the accumulator
function reduce(m: Machine, [f]: Callee[]) {
  let arr = m.pop('/')
  let n = arr.rowCount
  if (n === 0) {
    let id = f.prim === null ? undefined : IDENTITY.get(f.prim)
    if (id === undefined) throw RtE.type(`cannot reduce an empty array with ${f.name}: it has no identity`, arr)
    let rs = arr.rowShape
    arr.release()
    return m.push(ArrC.num(rs, new Float64Array(product(rs)).fill(id))) }
  let acc = rowOf(arr, n - 1)
  for (let i = n - 2; i >= 0; i--) {
    m.ctx.poll()
    ;[acc] = apply(m, f, [rowOf(arr, i), acc]) }
  arr.release()
  m.push(acc) }

function scan(m: Machine, [f]: Callee[]) {
  let arr = m.pop('\\')
  if (arr.isScalar) throw RtE.type('cannot scan a scalar', arr)
  let n = arr.rowCount
  if (n === 0) return m.push(arr)
  let acc = rowOf(arr, 0), out = [acc]
  for (let i = 1; i < n; i++) {
    m.ctx.poll()
    ;[acc] = apply(m, f, [rowOf(arr, i), acc.share()])
    out.push(acc) }
  arr.release()
  m.push(assemble(out, [n], m.ctx, 'scan')) }

// ∧f arr init: the accumulator goes below each row
function fold(m: Machine, [f]: Callee[]) {
  let arr = m.pop('∧'), acc = m.pop('∧')
  for (let i = 0; i < arr.rowCount; i++) {
    m.ctx.poll()
    ;[acc] = apply(m, f, [acc, rowOf(arr, i)]) }
  arr.release()
  m.push(acc) }

/** arguments of ∵ brought to one frame: prefix agreement, fill-padded where allowed */
function eachFrame(args: Value[], fill: FillContext): { args: Value[], shape: readonly number[] } {
  let r = Math.min(...args.map(v => v.rank))
  let bad = args.find(v => !shapeEq(v.shape.slice(0, r), args[0].shape.slice(0, r)))
  if (bad) {
    if (!args.every(v => hasFill(v.kind, fill))) throw RtE.shapes('cannot ∵ arrays', args[0], bad)
    let prefix = maxShape(args.map(v => v.shape.slice(0, r)))
    args = args.map(v => padTo(v, [...prefix, ...v.shape.slice(r)], fill)) }
  let longest = args.reduce((x, v) => v.rank > x.rank ? v : x)
  let off = args.find(v => !shapeEq(v.shape, longest.shape.slice(0, v.rank)))
  if (off) throw RtE.shapes('cannot ∵ arrays', longest, off)
  return {args, shape: longest.shape} }

function each(m: Machine, [f]: Callee[]) {
  let k = f.sig.args
  if (k === 0) return f.call()
  let taken = popArgs(m, k, '∵')
  let {args, shape} = eachFrame(taken, m.ctx)
  let n = product(shape), reps = args.map(v => product(shape.slice(v.rank)))
  let outs = outLists(f)
  for (let i = 0; i < n; i++) {
    m.ctx.poll()
    let ins = args.map((v, j) => elemOf(v, Math.floor(i / reps[j]))).reverse()
    apply(m, f, ins).forEach((r, o) => outs[o].push(r)) }
  releaseAll(taken)
  for (let o of outs) m.push(assemble(o, shape, m.ctx, 'each')) }

// rows of every non-scalar argument in step; with `fixTop` the top argument is passed whole
function byRows(m: Machine, f: Callee, what: string, fixTop: boolean) {
  let args = popArgs(m, f.sig.args, what)
  let varies = args.map((v, j) => !(fixTop && j === 0) && !v.isScalar)
  let counts = args.filter((_, j) => varies[j]).map(v => v.rowCount)
  if (counts.length === 0) {
    for (let v of args.reverse()) m.push(v)
    return f.call() }
  let n = counts[0]
  if (counts.some(c => c !== n))
    throw RtE.shape(`${what}: row counts ${counts.join(' and ')} do not match`, ...args)
  let outs = outLists(f)
  for (let i = 0; i < n; i++) {
    m.ctx.poll()
    let ins = args.map((v, j) => varies[j] ? rowOf(v, i) : v.share()).reverse()
    apply(m, f, ins).forEach((r, o) => outs[o].push(r)) }
  releaseAll(args)
  for (let o of outs) m.push(assemble(o, [n], m.ctx, what)) }

// every row of the top value against every row of the next
function table(m: Machine, [f]: Callee[]) {
  let a = m.pop('⊞'), b = m.pop('⊞')
  let frame = [...a.shape.slice(0, 1), ...b.shape.slice(0, 1)]
  let cells: Value[] = []
  for (let i = 0; i < a.rowCount; i++)
    for (let j = 0; j < b.rowCount; j++) {
      m.ctx.poll()
      cells.push(...apply(m, f, [rowOf(b, j), rowOf(a, i)])) }
  a.release(); b.release()
  m.push(assemble(cells, frame, m.ctx, 'table')) }

function repeat(m: Machine, [f]: Callee[]) {
  let nv = m.pop('⍥'), n = asNat(nv, 'repeat count')
  nv.release()
  for (let i = 0; i < n; i++) {
    m.ctx.poll()
    f.call() }}

// f over the rows of `vals` selected by each group of positions
function grouped(m: Machine, f: Callee, groups: number[][], keys: Value, vals: Value, what: string) {
  let cells: Value[] = []
  for (let sel of groups) {
    m.ctx.poll()
    cells.push(...apply(m, f, [S.select(ArrC.list(sel), vals, NO_FILL)])) }
  keys.release(); vals.release()
  m.push(assemble(cells, [groups.length], m.ctx, what)) }

function keyed(m: Machine, what: string): { keys: Value, vals: Value, ks: number[] } {
  let keys = m.pop(what), vals = m.pop(what)
  if (vals.isScalar) throw RtE.type(`cannot ${what} a scalar`, vals)
  let ks = asIntList(keys, `${what} indices`)
  if (keys.isScalar || ks.length !== vals.rowCount)
    throw RtE.shape(`${what} needs one index per row, but there are ${ks.length} for ${vals.rowCount} rows`, keys, vals)
  return {keys, vals, ks} }

// rows with index g form group g; negative indices drop their row
function group(m: Machine, [f]: Callee[]) {
  let {keys, vals, ks} = keyed(m, 'group')
  let groups: number[][] = []
  ks.forEach((k, i) => {
    if (k < 0) return
    while (groups.length <= k) groups.push([])
    groups[k].push(i) })
  grouped(m, f, groups, keys, vals, 'group') }

// each run of equal nonzero markers is one group
function partition(m: Machine, [f]: Callee[]) {
  let {keys, vals, ks} = keyed(m, 'partition')
  let groups: number[][] = []
  ks.forEach((k, i) => {
    if (k === 0) return
    if (i > 0 && ks[i - 1] === k) groups[groups.length - 1].push(i)
    else groups.push([i]) })
  grouped(m, f, groups, keys, vals, 'partition') }

// the lower set of arguments first, so the upper set's results end on top
function both(m: Machine, [f]: Callee[]) {
  let upper = popArgs(m, f.sig.args, '∩'), lower = popArgs(m, f.sig.args, '∩')
  for (let v of lower.reverse()) m.push(v)
  f.call()
  for (let v of upper.reverse()) m.push(v)
  f.call() }

function dip(m: Machine, [f]: Callee[]) {
  let x = m.pop('⊙')
  f.call()
  m.push(x) }

// g runs first on its arguments, then f on its own, so f's results end on top
function fork(m: Machine, [f, g]: Callee[]) {
  let vals = popArgs(m, Math.max(f.sig.args, g.sig.args), '⊃')
  let feed = (h: Callee) => {
    for (let i = h.sig.args - 1; i >= 0; i--) m.push(vals[i].share())
    h.call() }
  feed(g)
  feed(f)
  releaseAll(vals) }

function fill(m: Machine, [f]: Callee[]) {
  let v = m.pop('⬚')
  m.ctx.pushFill(v)
  try { f.call() }
  finally {
    m.ctx.popFill()
    v.release() }}

const TABLE: Record<Prim, Impl> = {
  [Prim.Dup]: {fn: ([a]) => [a, a.share()]},
  [Prim.Over]: {fn: ([a, b]) => [b, a, b.share()]},
  [Prim.Flip]: {fn: ([a, b]) => [a, b]},
  [Prim.Pop]: {fn: () => []},
  [Prim.Identity]: {fn: ([a]) => [a]},

  [Prim.Eta]: constant(Math.PI / 2),
  [Prim.Pi]: constant(Math.PI),
  [Prim.Tau]: constant(2 * Math.PI),
  [Prim.Infinity]: constant(Infinity),
  [Prim.Random]: {fn: (_, ctx) => [ArrC.scalar(ctx.rng.next())]},

  [Prim.Not]: pv1(Prim.Not, 'not'),
  [Prim.Sign]: pv1(Prim.Sign, 'sign'),
  [Prim.Neg]: pv1(Prim.Neg, 'neg'),
  [Prim.Abs]: pv1(Prim.Abs, 'abs'),
  [Prim.Sqrt]: pv1(Prim.Sqrt, 'sqrt'),
  [Prim.Sin]: pv1(Prim.Sin, 'sin'),
  [Prim.Cos]: pv1(Prim.Cos, 'cos'),
  [Prim.Tan]: pv1(Prim.Tan, 'tan'),
  [Prim.Asin]: pv1(Prim.Asin, 'asin'),
  [Prim.Acos]: pv1(Prim.Acos, 'acos'),
  [Prim.Floor]: pv1(Prim.Floor, 'floor'),
  [Prim.Ceil]: pv1(Prim.Ceil, 'ceil'),
  [Prim.Round]: pv1(Prim.Round, 'round'),

  [Prim.Eq]: pv2('eq'),
  [Prim.Ne]: pv2('ne'),
  [Prim.Lt]: pv2('lt'),
  [Prim.Le]: pv2('le'),
  [Prim.Gt]: pv2('gt'),
  [Prim.Ge]: pv2('ge'),
  [Prim.Add]: pv2('add'),
  [Prim.Sub]: pv2('sub'),
  [Prim.Mul]: pv2('mul'),
  [Prim.Div]: pv2('div'),
  [Prim.Mod]: pv2('mod'),
  [Prim.Pow]: pv2('pow'),
  [Prim.Log]: pv2('log'),
  [Prim.Min]: pv2('min'),
  [Prim.Max]: pv2('max'),
  [Prim.Atan]: pv2('atan'),

  [Prim.Len]: mon(S.length),
  [Prim.Shape]: mon(S.shapeOf),
  [Prim.Range]: mon(S.range),
  [Prim.First]: mon(S.first),
  [Prim.Reverse]: mon(S.reverse),
  [Prim.Deshape]: mon(S.deshape),
  [Prim.Transpose]: mon(S.transpose),
  [Prim.Rise]: mon(S.rise),
  [Prim.Fall]: mon(S.fall),
  [Prim.Where]: mon(S.where),
  [Prim.Classify]: mon(S.classify),
  [Prim.Dedup]: mon(S.deduplicate),
  [Prim.Box]: mon(S.box),
  [Prim.Unbox]: mon(S.unbox),

  [Prim.Match]: dy(S.match),
  [Prim.Join]: dy(S.join),
  [Prim.Couple]: dy(S.couple),
  [Prim.Select]: dy(S.select),
  [Prim.Pick]: dy(S.pick),
  [Prim.Reshape]: dy(S.reshape),
  [Prim.Take]: dy(S.take),
  [Prim.Drop]: dy(S.drop),
  [Prim.Rotate]: dy(S.rotate),
  [Prim.Windows]: dy(S.windows),
  [Prim.Keep]: dy(S.keep),
  [Prim.Find]: dy(S.find),
  [Prim.Member]: dy(S.member),
  [Prim.IndexOf]: dy(S.indexOf),

  [Prim.Reduce]: {mod: reduce},
  [Prim.Fold]: {mod: fold},
  [Prim.Scan]: {mod: scan},
  [Prim.Each]: {mod: each},
  [Prim.Rows]: {mod: (m, [f]) => byRows(m, f, 'rows', false)},
  [Prim.Distribute]: {mod: (m, [f]) => byRows(m, f, 'distribute', f.sig.args >= 2)},
  [Prim.Table]: {mod: table},
  [Prim.Repeat]: {mod: repeat},
  [Prim.Group]: {mod: group},
  [Prim.Partition]: {mod: partition},
  [Prim.Both]: {mod: both},
  [Prim.Dip]: {mod: dip},
  [Prim.Fork]: {mod: fork},
  [Prim.If]: {mod: () => { throw new Error('? is compiled to branches') }},
  [Prim.Fill]: {mod: fill},

  [Prim.Print]: {fn: ([a], ctx) => { ctx.output.writeLine(show(a)); return [] }},
}

/** implementations in primitive id order */
export const IMPLS: readonly Impl[] = PRIMS.map(d => TABLE[d.prim])

export let implOf = (p: Prim): Impl => IMPLS[p]
