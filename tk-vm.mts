// the fetch-execute loop
import {ArrC, ArrQ, type Value, fromRows} from './tk-array.mjs'
import type {Span} from './tk-core.mjs'
import {RuntimeError, RtE} from './tk-errors.mjs'
import {Op, type FnRef, type Program} from './tk-bytecode.mjs'
import {type Prim, primDef, primText} from './tk-prims.mjs'
import {type Callee, type Machine, implOf} from './tk-defs.mjs'
import type {ExecContext} from './tk-context.mjs'

type Slot
  = { kind: 'value', v: Value }
  | { kind: 'fn', fn: Program, scope: number }   // scope: handle of the defining scope

const NO_SCOPE = -1

/**
 * Scopes live in an arena and refer to their parent by handle, so a bound
 * function can hold its defining scope without owning it.
 */
export class ScopeArena {
  private slots: Array<Array<Slot | undefined>> = []
  private parents: number[] = []
  private free: number[] = []

  open(parent: number, size: number): number {
    let h = this.free.pop() ?? this.slots.length
    this.slots[h] = new Array<Slot | undefined>(size)
    this.parents[h] = parent
    return h }

  close(h: number): void {
    for (let s of this.slots[h]) if (s?.kind === 'value') s.v.release()
    this.slots[h] = []
    this.free.push(h) }

  get live(): number { return this.slots.length - this.free.length }

  set(h: number, slot: number, s: Slot): void {
    let old = this.slots[h][slot]
    if (old?.kind === 'value') old.v.release()
    this.slots[h][slot] = s }

  lookup(h: number, depth: number, slot: number): Slot {
    for (let d = 0; d < depth; d++) h = this.parents[h]
    let s = this.slots[h]?.[slot]
    if (s === undefined) throw new Error(`unbound slot ${slot} at depth ${depth}`)
    return s }}

export class VM implements Machine {
  readonly scopes = new ScopeArena()
  private marks: number[] = []   // BEGIN_ARRAY heights, lowered when values below them are popped

  constructor(readonly ctx: ExecContext, readonly stack: Value[] = []) {}

  get height(): number { return this.stack.length }

  push = (v: Value): void => { this.stack.push(v) }

  pop = (what: string): Value => {
    let v = this.stack.pop()
    if (v === undefined) throw RtE.underflow(what, 1, 0)
    let h = this.stack.length
    for (let k = this.marks.length - 1; k >= 0 && this.marks[k] > h; k--) this.marks[k] = h
    return v }

  private need(what: string, n: number) {
    if (this.stack.length < n) throw RtE.underflow(what, n, this.stack.length) }

  /** run a whole program in a fresh root scope; the final stack is the result */
  main(p: Program): Value[] {
    let root = this.scopes.open(NO_SCOPE, p.slots)
    try { this.execute(p, root) }
    finally { this.scopes.close(root) }
    return this.stack }

  // pop declared args, call, release the args that were not passed through
  callPrim(p: Prim): void {
    let def = primDef(p), impl = implOf(p)
    if (!('fn' in impl) || def.sig === null) throw new Error(`${def.name} is not a function`)
    let n = def.sig.args
    this.need(primText(p), n)
    let args: Value[] = []
    for (let i = 0; i < n; i++) args.push(this.pop(primText(p)))
    let outs = impl.fn(args, this.ctx)
    for (let a of args) if (!outs.includes(a)) a.release()
    for (let v of outs) this.stack.push(v) }

  // a function body in a new child scope of `parent`
  callProgram(p: Program, parent: number): void {
    if (p.signature) this.need(p.name ?? 'function', p.signature.args)
    let scope = this.scopes.open(parent, p.slots)
    try { this.execute(p, scope) }
    finally { this.scopes.close(scope) }}

  private callee(ref: FnRef, p: Program, scope: number): Callee {
    if ('prim' in ref) {
      let prim = ref.prim, s = primDef(prim).sig
      if (s === null) throw new Error(`modifier ${primText(prim)} given as an operand`)
      return {name: primText(prim), prim, sig: s, call: () => this.callPrim(prim)} }
    let fn = p.functions[ref.fn]
    if (fn.signature === null) throw new Error('operand with a dynamic signature')
    return {name: fn.name ?? 'function', prim: null, sig: fn.signature, call: () => this.callProgram(fn, scope)} }

  private collect(count: number, boxed: boolean): Value {
    let vs: Value[] = []
    for (let i = 0; i < count; i++) vs.push(this.pop('array'))   // first popped is row 0
    if (boxed) return vs.length ? fromRows(vs.map(v => ArrC.boxed(v)), this.ctx) : ArrC.box([0], [])
    let out = fromRows(vs, this.ctx)
    for (let v of vs) v.release()
    return out }

  execute(p: Program, scope: number): void {
    let code = p.code, pc = 0
    while (pc < code.length) {
      let ins = code[pc++], at: Span = ins[1]
      this.ctx.poll()
      try {
        switch (ins[0]) {
          case Op.PUSH: this.stack.push(p.constants[ins[2]].share()); break
          case Op.PRIM: this.callPrim(ins[2]); break
          case Op.MOD: {
            let impl = implOf(ins[2].prim)
            if (!('mod' in impl)) throw new Error(`${primText(ins[2].prim)} is not a modifier`)
            this.need(primText(ins[2].prim), ins[2].args)
            impl.mod(this, ins[2].fns.map(f => this.callee(f, p, scope)))
            break }
          case Op.CALL: this.callProgram(p.functions[ins[2]], scope); break
          case Op.BIND:
            this.scopes.set(scope, ins[2].slot, {kind: 'value', v: this.pop(ins[2].name)}); break
          case Op.BIND_FN:
            this.scopes.set(scope, ins[2].slot, {kind: 'fn', fn: p.functions[ins[2].fn], scope}); break
          case Op.LOAD: {
            let s = this.scopes.lookup(scope, ins[2].depth, ins[2].slot)
            if (s.kind === 'value') this.stack.push(s.v.share())
            else this.callProgram(s.fn, s.scope)
            break }
          case Op.BRANCH: pc = ins[2]; break
          case Op.BRANCH_UNLESS: {
            let c = this.pop('?')
            let x = c.isScalar && ArrQ.isNumeric(c) ? c.data[0] : NaN
            c.release()
            if (!(x === 0 || x === 1)) throw RtE.type('the condition of ? must be 0 or 1', c)
            if (x === 0) pc = ins[2]
            break }
          case Op.ARRAY: this.stack.push(this.collect(ins[2].count, ins[2].boxed)); break
          case Op.BEGIN_ARRAY: this.marks.push(this.stack.length); break
          case Op.END_ARRAY: {
            let mark = this.marks.pop() ?? 0
            this.stack.push(this.collect(this.stack.length - mark, ins[2].boxed))
            break }}}
      catch (e) {
        if (e instanceof RuntimeError) throw e.at(at)
        throw e }}}}
