import {Kind, type Value} from './tk-array.mjs'
import {showSig} from './tk-core.mjs'
import {Op, type FnRef, type Instr, type Program} from './tk-bytecode.mjs'
import {primText} from './tk-prims.mjs'

const CHAR_ESCAPES: Record<string, string> = {
  '\n': '\\n', '\t': '\\t', '\r': '\\r', '\0': '\\0', '\\': '\\\\' }

export function showNum(x: number): string {
  if (Number.isNaN(x)) return 'NaN'
  if (x === Infinity) return '∞'
  if (x === -Infinity) return '¯∞'
  return String(x).replace(/-/g, '¯') }

let showChar = (c: string): string => '@' + (CHAR_ESCAPES[c] ?? (c === ' ' ? '\\s' : c))

let showStr = (cs: readonly string[]): string =>
  '"' + cs.map(c => c === '"' ? '\\"' : CHAR_ESCAPES[c] ?? c).join('') + '"'

export class TackWriter {

  // one element of a flat array
  private elem(v: Value, i: number): string {
    switch (v.kind) {
      case Kind.BYTE: return String(v.data[i])
      case Kind.NUM: return showNum(v.data[i])
      case Kind.CHAR: return showChar(v.data[i])
      case Kind.BOX: return this.show(v.data[i]) }}

  // cells of `shape` starting at flat offset `at`
  private cells(v: Value, shape: readonly number[], at: number): string {
    if (shape.length === 0) return this.elem(v, at)
    let [n, ...rest] = shape
    let len = rest.reduce((a, b) => a * b, 1)
    if (rest.length === 0 && v.kind === Kind.CHAR) return showStr(v.data.slice(at, at + n))
    let parts: string[] = []
    for (let i = 0; i < n; i++) parts.push(this.cells(v, rest, at + i * len))
    let [open, close] = rest.length === 0 && v.kind === Kind.BOX ? ['{', '}'] : ['[', ']']
    return open + parts.join(' ') + close }

  show: (v: Value) => string = (v) => {
    if (v.isScalar && v.kind === Kind.BOX) return '□' + this.show(v.data[0])
    return this.cells(v, v.shape, 0) }

  /** code listing of a program and, after it, of each nested function */
  disassemble(p: Program, path = p.name ?? 'fn'): string[] {
    let lines = [`${path} ${showSig(p.signature)} slots=${p.slots}`]
    p.code.forEach((ins, i) => lines.push(`${String(i).padStart(4)}  ${ins[0].padEnd(13)} ${this.operand(p, ins)}`.trimEnd()))
    p.functions.forEach((f, i) => lines.push(...this.disassemble(f, `${path}.${i}`)))
    return lines }

  private operand(p: Program, ins: Instr): string {
    let fn = (r: FnRef) => 'prim' in r ? primText(r.prim) : `fn#${r.fn}`
    switch (ins[0]) {
      case Op.PUSH: return this.show(p.constants[ins[2]])
      case Op.PRIM: return primText(ins[2])
      case Op.MOD: return [primText(ins[2].prim), ...ins[2].fns.map(fn)].join(' ')
      case Op.CALL: return `fn#${ins[2]}`
      case Op.BIND: return `${ins[2].name} [${ins[2].slot}]`
      case Op.BIND_FN: return `${ins[2].name} [${ins[2].slot}] fn#${ins[2].fn}`
      case Op.LOAD: return `${ins[2].name} [${ins[2].depth}:${ins[2].slot}]`
      case Op.BRANCH: case Op.BRANCH_UNLESS: return `→${ins[2]}`
      case Op.ARRAY: return `${ins[2].count}${ins[2].boxed ? ' boxed' : ''}`
      case Op.BEGIN_ARRAY: return ''
      case Op.END_ARRAY: return ins[2].boxed ? 'boxed' : '' }}}

let writer = new TackWriter()

export let show: (v: Value) => string = (v) => writer.show(v)

/** one line per value, bottom of the stack first */
export let showStack = (vs: readonly Value[]): string => vs.map(show).join('\n')

export let disassemble = (p: Program): string => writer.disassemble(p).join('\n')
