// bytecode: instructions are [op, span, payload] like every other tree in tack
import type {Signature, Span} from './tk-core.mjs'
import type {Value} from './tk-array.mjs'
import type {Prim} from './tk-prims.mjs'

export enum Op {
  PUSH = 'PUSH',                   // constant index
  PRIM = 'PRIM',                   // primitive id
  MOD = 'MOD',                     // modifier with its function operands
  CALL = 'CALL',                   // function index, run in a child scope
  BIND = 'BIND',                   // pop a value into a slot
  BIND_FN = 'BIND_FN',             // bind a function closing over the current scope
  LOAD = 'LOAD',                   // push a bound value or call a bound function
  BRANCH = 'BRANCH',               // jump
  BRANCH_UNLESS = 'BRANCH_UNLESS', // pop a condition, jump when it is zero
  ARRAY = 'ARRAY',                 // pop `count` values into an array, first popped is row 0
  BEGIN_ARRAY = 'BEGIN_ARRAY',     // mark the stack height
  END_ARRAY = 'END_ARRAY',         // collect everything above the mark
}

/** a modifier operand: a primitive to dispatch directly, or a function of the enclosing program */
export type FnRef = { prim: Prim } | { fn: number }

export type ModP = { prim: Prim, fns: FnRef[], args: number }   // args: values checked for before the call
export type BindP = { name: string, slot: number }
export type BindFnP = { name: string, slot: number, fn: number }
export type LoadP = { name: string, depth: number, slot: number }
export type ArrayP = { count: number, boxed: boolean }

export type Instr
  = [Op.PUSH, Span, number]
  | [Op.PRIM, Span, Prim]
  | [Op.MOD, Span, ModP]
  | [Op.CALL, Span, number]
  | [Op.BIND, Span, BindP]
  | [Op.BIND_FN, Span, BindFnP]
  | [Op.LOAD, Span, LoadP]
  | [Op.BRANCH, Span, number]
  | [Op.BRANCH_UNLESS, Span, number]
  | [Op.ARRAY, Span, ArrayP]
  | [Op.BEGIN_ARRAY, Span, null]
  | [Op.END_ARRAY, Span, {boxed: boolean}]

export interface Program {
  name?: string
  code: Instr[]
  constants: Value[]
  functions: Program[]
  signature: Signature | null   // null when the stack effect is only known at run time
  slots: number                 // binding slots of the function's scope
}
