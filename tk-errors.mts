// error taxonomy. every error carries the source span it arose from, when known.
import type {Span} from './tk-core.mjs'
import type {Kind, Value} from './tk-array.mjs'

export class TackError extends Error {
  span: Span | null
  constructor(message: string, span: Span | null) {
    super(message)
    this.name = new.target.name
    this.span = span }}

export enum LexCode {
  UNRECOGNIZED = 'UnrecognizedCharacter',
  UNTERMINATED_STRING = 'UnterminatedString',
  UNTERMINATED_CHAR = 'UnterminatedCharacter',
  BAD_ESCAPE = 'UnknownEscape',
  MALFORMED_NUMBER = 'MalformedNumber',
}

export class LexError extends TackError {
  constructor(readonly code: LexCode, readonly reason: string, span: Span) {
    super(reason, span) }}

export class ParseError extends TackError {
  constructor(readonly expected: string, readonly found: string, span: Span) {
    super(`expected ${expected}, found ${found}`, span) }}

export enum CompileCode {
  UNBOUND_NAME = 'UnboundName',
  ARITY_MISMATCH = 'ArityMismatch',
}

export class CompileError extends TackError {
  constructor(readonly code: CompileCode, message: string, span: Span) {
    super(message, span) }}

export enum RuntimeCode {
  SHAPE_MISMATCH = 'ShapeMismatch',
  TYPE_MISMATCH = 'TypeMismatch',
  STACK_UNDERFLOW = 'StackUnderflow',
  INDEX_OUT_OF_BOUNDS = 'IndexOutOfBounds',
  DIVISION_BY_ZERO = 'DivisionByZero',
  INTERRUPTED = 'Interrupted',
}

/** kind and shape of a value involved in a failing operation */
export type Operand = { kind: Kind, shape: number[] }

export let operandOf = (v: Value): Operand => ({kind: v.kind, shape: [...v.shape]})

export class RuntimeError extends TackError {
  constructor(readonly code: RuntimeCode, message: string,
              readonly operands: Operand[] = [], span: Span | null = null) {
    super(message, span) }

  /** attach the span of the instruction that failed, unless a deeper one is already set */
  at(span: Span | null): this {
    if (this.span === null) this.span = span
    return this }}

export type StaticError = LexError | ParseError | CompileError

let fmtShape = (s: readonly number[]) => `[${s.join(' ')}]`

/** runtime error constructors */
export const RtE = {
  shape(message: string, ...vs: Value[]) {
    return new RuntimeError(RuntimeCode.SHAPE_MISMATCH, message, vs.map(operandOf)) },
  shapes(what: string, a: Value, b: Value) {
    return RtE.shape(`${what}: shapes ${fmtShape(a.shape)} and ${fmtShape(b.shape)} do not match`, a, b) },
  type(message: string, ...vs: Value[]) {
    return new RuntimeError(RuntimeCode.TYPE_MISMATCH, message, vs.map(operandOf)) },
  underflow(what: string, needed: number, have: number) {
    return new RuntimeError(RuntimeCode.STACK_UNDERFLOW,
      `${what} needs ${needed} value${needed === 1 ? '' : 's'} but the stack has ${have}`) },
  index(message: string, ...vs: Value[]) {
    return new RuntimeError(RuntimeCode.INDEX_OUT_OF_BOUNDS, message, vs.map(operandOf)) },
  divZero(...vs: Value[]) {
    return new RuntimeError(RuntimeCode.DIVISION_BY_ZERO, 'modulus by zero', vs.map(operandOf)) },
  interrupted() {
    return new RuntimeError(RuntimeCode.INTERRUPTED, 'execution interrupted') },
}
