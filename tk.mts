/**
 * Tack public entry points.
 *
 *   let p = compile('/+ ⇡5')
 *   if (p.ok) run(p.value, [])   // → ok([10])
 *
 * Static errors come back from compile, runtime errors from run; nothing here throws
 * a Tack error.
 */
import {type Result, ok, err} from './tk-core.mjs'
import {tokenize} from './tk-lex.mjs'
import {parse} from './tk-parse.mjs'
import {compile as compileTop} from './tk-compile.mjs'
import type {Program} from './tk-bytecode.mjs'
import type {Value} from './tk-array.mjs'
import {LexError, ParseError, CompileError, RuntimeError, RtE, type StaticError} from './tk-errors.mjs'
import {ExecContext, type ExecOptions} from './tk-context.mjs'
import {VM} from './tk-vm.mjs'

export {spanPosition, type Span, type Signature, type Result} from './tk-core.mjs'
export {toExternal, fromExternal, type External, type Value} from './tk-array.mjs'
export {show, showStack, disassemble} from './tk-show.mjs'
export type {Program} from './tk-bytecode.mjs'
export * from './tk-errors.mjs'
export {
  type ExecOptions, type OutputProvider,
  ConsoleOutputProvider, CaptureOutputProvider, InterruptFlag,
} from './tk-context.mjs'
export {KernelPool, type PoolOptions} from './tk-pool.mjs'

let isStatic = (e: unknown): e is StaticError =>
  e instanceof LexError || e instanceof ParseError || e instanceof CompileError

export function compile(source: string): Result<Program, StaticError> {
  try { return ok(compileTop(parse(tokenize(source)))) }
  catch (e) {
    if (isStatic(e)) return err(e)
    throw e }}

/**
 * Run a compiled program on `stack` (bottom first). The caller's values are
 * shared, never modified. A static signature that needs more values than
 * `stack` holds fails before anything runs.
 */
export function run(program: Program, stack: readonly Value[], options: ExecOptions = {}): Result<Value[], RuntimeError> {
  let s = program.signature
  if (s && stack.length < s.args) return err(RtE.underflow(program.name ?? 'program', s.args, stack.length))
  let vm = new VM(new ExecContext(options), stack.map(v => v.share()))
  try { return ok(vm.main(program)) }
  catch (e) {
    if (e instanceof RuntimeError) return err(e)
    throw e }}

/** compile and run */
export function evaluate(source: string, stack: readonly Value[] = [], options: ExecOptions = {}):
    Result<Value[], StaticError | RuntimeError> {
  let p = compile(source)
  return p.ok ? run(p.value, stack, options) : p }
