// compiler: syntax tree to bytecode, inferring stack signatures on the way
import {
  NodeT, nodeSpan, sig, showSig,
  type ArrNode, type BindNode, type Item, type ModNode, type Signature, type Span,
  type StrandNode, type TopNode, type Word,
} from './tk-core.mjs'
import {CompileCode, CompileError} from './tk-errors.mjs'
import {ArrC, type Value} from './tk-array.mjs'
import {Prim, primByName, primDef, primText} from './tk-prims.mjs'
import {Op, type FnRef, type Instr, type Program} from './tk-bytecode.mjs'

/** height and low-water mark of the stack while walking code in execution order */
export class SigTracker {
  height = 0
  low = 0
  dynamic = false
  apply(s: Signature | null): void {
    if (s === null) { this.dynamic = true; return }
    this.height -= s.args
    this.low = Math.min(this.low, this.height)
    this.height += s.outputs }
  get result(): Signature | null {
    return this.dynamic ? null : sig(this.low === 0 ? 0 : -this.low, this.height - this.low) }}

type Binding = { kind: 'value' | 'fn', slot: number, sig: Signature | null }

class CScope {
  names = new Map<string, Binding>()
  slots = 0
  constructor(readonly parent: CScope | null) {}
  declare(name: string, kind: Binding['kind'], s: Signature | null): number {
    let slot = this.slots++
    this.names.set(name, {kind, slot, sig: s})
    return slot }}

let arity = (message: string, at: Span) => new CompileError(CompileCode.ARITY_MISMATCH, message, at)

let isNet = (s: Signature, args: number, outputs: number) => s.args === args && s.outputs === outputs

/** Compiles one function body: its own code, constants, nested functions and scope. */
class FnBuilder {
  code: Instr[] = []
  constants: Value[] = []
  functions: Program[] = []
  sig = new SigTracker()

  constructor(readonly scope: CScope, readonly name?: string) {}

  private push(v: Value, at: Span) {
    this.code.push([Op.PUSH, at, this.constants.length])
    this.constants.push(v)
    this.sig.apply(sig(0, 1)) }

  private addFn(p: Program): number {
    this.functions.push(p)
    return this.functions.length - 1 }

  finish(): Program {
    return {name: this.name, code: this.code, constants: this.constants,
            functions: this.functions, signature: this.sig.result, slots: this.scope.slots} }

  /** a nested function body compiled in a child scope */
  child(items: Item[], name?: string): Program {
    let b = new FnBuilder(new CScope(this.scope), name)
    b.items(items)
    return b.finish() }

  items(items: Item[]) {
    for (let it of items) {
      if (it[0] === NodeT.BIND) this.bind(it)
      else this.words(it[2]) }}

  // words on a line run right to left
  words(ws: Word[]) {
    for (let i = ws.length - 1; i >= 0; i--) this.word(ws[i]) }

  private bind(b: BindNode) {
    let [, a, ws] = b
    let only = ws.length === 1 ? ws[0] : undefined
    let body = only && only[0] === NodeT.FUNC ? only[2] : null
    let probe = this.child(body ?? [[NodeT.LINE, a.span, ws]], a.name)
    if (body === null && probe.signature !== null && isNet(probe.signature, 0, 1)) {
      this.words(ws)
      let slot = this.scope.declare(a.name, 'value', sig(0, 1))
      this.code.push([Op.BIND, a.span, {name: a.name, slot}])
      this.sig.apply(sig(1, 0))
      return }
    // declared after compiling the body: a binding never sees itself
    let fn = this.addFn(probe)
    let slot = this.scope.declare(a.name, 'fn', probe.signature)
    this.code.push([Op.BIND_FN, a.span, {name: a.name, slot, fn}]) }

  private resolve(name: string): { depth: number, slot: number, b: Binding } | null {
    let depth = 0
    for (let s: CScope | null = this.scope; s; s = s.parent, depth++) {
      let b = s.names.get(name)
      if (b) return {depth, slot: b.slot, b} }
    return null }

  word(w: Word) {
    switch (w[0]) {
      case NodeT.NUM: return this.push(ArrC.scalar(w[2]), w[1])
      case NodeT.CHR: return this.push(ArrC.chr(w[2]), w[1])
      case NodeT.STR: return this.push(ArrC.str(w[2]), w[1])
      case NodeT.PRIM: return this.prim(w[2], w[1])
      case NodeT.IDENT: return this.ident(w[2], w[1])
      case NodeT.MOD: return this.modifier(w)
      case NodeT.STRAND: return this.strand(w)
      case NodeT.ARR: return this.array(w)
      case NodeT.FUNC: {
        let p = this.child(w[2])
        this.code.push([Op.CALL, w[1], this.addFn(p)])
        return this.sig.apply(p.signature) }}}

  private prim(p: Prim, at: Span) {
    this.code.push([Op.PRIM, at, p])
    this.sig.apply(primDef(p).sig) }

  private ident(name: string, at: Span) {
    let r = this.resolve(name)
    if (r) {
      this.code.push([Op.LOAD, at, {name, depth: r.depth, slot: r.slot}])
      return this.sig.apply(r.b.kind === 'value' ? sig(0, 1) : r.b.sig) }
    let p = primByName(name)
    if (p === undefined) throw new CompileError(CompileCode.UNBOUND_NAME, `unknown name '${name}'`, at)
    this.prim(p, at) }

  // literal-only strands and arrays become a single constant
  private literalList(ws: Word[]): Value | null {
    if (ws.length && ws.every(w => w[0] === NodeT.NUM))
      return ArrC.list(ws.map(w => w[0] === NodeT.NUM ? w[2] : 0))
    if (ws.length && ws.every(w => w[0] === NodeT.CHR))
      return ArrC.char([ws.length], ws.map(w => w[0] === NodeT.CHR ? w[2] : ''))
    return null }

  private strand(w: StrandNode) {
    let [, at, parts] = w
    let lit = this.literalList(parts)
    if (lit) return this.push(lit, at)
    for (let i = parts.length - 1; i >= 0; i--) {
      let outer = this.sig
      this.sig = new SigTracker()
      this.word(parts[i])
      let s = this.sig.result
      this.sig = outer
      if (s === null || !isNet(s, 0, 1))
        throw arity('each part of a strand must push exactly one value', nodeSpan(parts[i]))
      this.sig.apply(s) }
    this.code.push([Op.ARRAY, at, {count: parts.length, boxed: false}])
    this.sig.apply(sig(parts.length, 1)) }

  private array(w: ArrNode) {
    let [, {span: at, boxed}, items] = w
    let only = items.length === 1 ? items[0] : null
    if (!boxed && only && only[0] === NodeT.LINE) {
      let lit = this.literalList(only[2])
      if (lit) return this.push(lit, at) }
    let inner = new FnBuilder(this.scope)
    inner.items(items)
    let s = inner.sig.result
    // inner code shares this scope, so its constants and functions are renumbered into ours
    let base = this.code.length + (s === null ? 1 : 0)
    let code = inner.code.map(ins => this.adopt(ins, inner, base))
    if (s === null) {
      this.code.push([Op.BEGIN_ARRAY, at, null], ...code, [Op.END_ARRAY, at, {boxed}])
      return this.sig.apply(null) }
    this.code.push(...code, [Op.ARRAY, at, {count: s.outputs, boxed}])
    this.sig.apply(sig(s.args, 1)) }

  private adopt(ins: Instr, from: FnBuilder, base: number): Instr {
    let fnAt = (i: number) => this.addFn(from.functions[i])
    switch (ins[0]) {
      case Op.PUSH: {
        this.constants.push(from.constants[ins[2]])
        return [Op.PUSH, ins[1], this.constants.length - 1] }
      case Op.CALL: return [Op.CALL, ins[1], fnAt(ins[2])]
      case Op.BIND_FN: return [Op.BIND_FN, ins[1], {...ins[2], fn: fnAt(ins[2].fn)}]
      case Op.MOD: return [Op.MOD, ins[1], {...ins[2], fns: ins[2].fns.map(f => 'fn' in f ? {fn: fnAt(f.fn)} : f)}]
      case Op.BRANCH: return [Op.BRANCH, ins[1], ins[2] + base]
      case Op.BRANCH_UNLESS: return [Op.BRANCH_UNLESS, ins[1], ins[2] + base]
      default: return ins }}

  // ---- modifiers

  private operand(w: Word, owner: Prim): [FnRef, Signature] {
    let ref: FnRef, s: Signature | null
    let direct = w[0] === NodeT.PRIM ? w[2]
      : w[0] === NodeT.IDENT && !this.resolve(w[2]) ? primByName(w[2]) : undefined
    if (direct !== undefined && primDef(direct).sig !== null) {
      ref = {prim: direct}
      s = primDef(direct).sig }
    else {
      let p = w[0] === NodeT.FUNC ? this.child(w[2]) : this.child([[NodeT.LINE, nodeSpan(w), [w]]])
      ref = {fn: this.addFn(p)}
      s = p.signature }
    if (s === null) throw arity(`the function given to ${primText(owner)} has a dynamic stack effect`, nodeSpan(w))
    return [ref, s] }

  private modifier(w: ModNode) {
    let [, {span: at, prim}, ops] = w
    let refs: FnRef[] = [], sigs: Signature[] = []
    for (let op of ops) {
      let [r, s] = this.operand(op, prim)
      refs.push(r); sigs.push(s) }
    let [f, g] = sigs
    let need = (args: number, outputs: number) => {
      if (!isNet(f, args, outputs))
        throw arity(`${primText(prim)} needs a function with signature ${showSig(sig(args, outputs))}, got ${showSig(f)}`,
                    nodeSpan(ops[0])) }
    let out: Signature | null
    switch (prim) {
      case Prim.Reduce: case Prim.Scan: need(2, 1); out = sig(1, 1); break
      case Prim.Fold: case Prim.Table: need(2, 1); out = sig(2, 1); break
      case Prim.Group: case Prim.Partition: need(1, 1); out = sig(2, 1); break
      case Prim.Each: case Prim.Rows: case Prim.Distribute: out = f; break
      case Prim.Repeat: out = f.args === f.outputs ? sig(f.args + 1, f.outputs) : null; break
      case Prim.Both: out = sig(2 * f.args, 2 * f.outputs); break
      case Prim.Dip: out = sig(f.args + 1, f.outputs + 1); break
      case Prim.Fill: out = sig(f.args + 1, f.outputs); break
      case Prim.Fork: out = sig(Math.max(f.args, g.args), f.outputs + g.outputs); break
      case Prim.If: return this.branches(at, refs, f, g)
      default: throw new Error(`not a modifier: ${primText(prim)}`) }
    // a repeat with a dynamic effect can only promise its count
    this.code.push([Op.MOD, at, {prim, fns: refs, args: out?.args ?? 1}])
    this.sig.apply(out) }

  // ?f g runs f when the popped condition is nonzero, g otherwise
  private branches(at: Span, [f, g]: FnRef[], fs: Signature, gs: Signature) {
    if (fs.outputs - fs.args !== gs.outputs - gs.args)
      throw arity(`the branches of ? must have the same stack effect, got ${showSig(fs)} and ${showSig(gs)}`, at)
    let call = (r: FnRef): Instr => 'prim' in r ? [Op.PRIM, at, r.prim] : [Op.CALL, at, r.fn]
    let unless: [Op.BRANCH_UNLESS, Span, number] = [Op.BRANCH_UNLESS, at, 0]
    this.code.push(unless, call(f))
    let skip: [Op.BRANCH, Span, number] = [Op.BRANCH, at, 0]
    this.code.push(skip)
    unless[2] = this.code.length
    this.code.push(call(g))
    skip[2] = this.code.length
    let args = Math.max(fs.args, gs.args)
    this.sig.apply(sig(args + 1, args + fs.outputs - fs.args)) }}

/** bytecode for a whole program; throws CompileError */
export function compile(top: TopNode): Program {
  let b = new FnBuilder(new CScope(null), 'main')
  b.items(top[2])
  return b.finish() }
