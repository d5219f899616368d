// shared test helpers: evaluate source and look at the stack
import {evaluate, show, toExternal, type ExecOptions, type External, type Value} from '../tk.mjs'
import type {TackError} from '../tk-errors.mjs'

export function ev(src: string, opts: ExecOptions = {}, stack: Value[] = []): Value[] {
  let r = evaluate(src, stack, opts)
  if (!r.ok) throw r.error
  return r.value }

/** the final stack rendered, bottom first */
export let shown = (src: string, opts: ExecOptions = {}): string[] => ev(src, opts).map(show)

/** the single value left on the stack, rendered */
export function one(src: string, opts: ExecOptions = {}): string {
  let vs = shown(src, opts)
  if (vs.length !== 1) throw new Error(`expected one value, got ${vs.length}: ${vs.join(' | ')}`)
  return vs[0] }

export let ext = (src: string, opts: ExecOptions = {}): External[] => ev(src, opts).map(toExternal)

export function failure(src: string, opts: ExecOptions = {}): TackError {
  let r = evaluate(src, [], opts)
  if (r.ok) throw new Error(`expected ${src} to fail, got ${r.value.map(show).join(' | ')}`)
  return r.error }
