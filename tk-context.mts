// per-run execution context: options, fill values, random state, output, cancellation
import {ArrC, Kind, type Value, type FillContext} from './tk-array.mjs'
import {RtE} from './tk-errors.mjs'
import type {KernelPool} from './tk-pool.mjs'

// Output provider abstraction, so hosts can redirect what programs print
export interface OutputProvider {
  writeLine(text: string): void
}

export class ConsoleOutputProvider implements OutputProvider {
  writeLine(text: string): void {
    console.log(text) }}

/** collects printed lines, for tools and tests */
export class CaptureOutputProvider implements OutputProvider {
  lines: string[] = []
  writeLine(text: string): void { this.lines.push(text) }
  take(): string[] { let out = this.lines; this.lines = []; return out }}

/** A cancellation flag another thread (or a timer) can raise while the VM runs. */
export class InterruptFlag {
  readonly cell: Int32Array
  constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)) {
    this.cell = new Int32Array(buffer) }
  get buffer(): ArrayBufferLike { return this.cell.buffer }
  get raised(): boolean { return Atomics.load(this.cell, 0) !== 0 }
  raise(): void { Atomics.store(this.cell, 0, 1) }
  clear(): void { Atomics.store(this.cell, 0, 0) }}

/**
 * Seeded pseudo-random number generator (xorshift32), so runs with the same
 * seed see the same sequence.
 */
export class SeededRNG {
  private state: number
  constructor(seed: number) {
    this.state = seed === 0 ? 1 : seed >>> 0 }
  /** next number in [0, 1) */
  next(): number {
    let x = this.state
    x ^= x << 13
    x ^= x >>> 17
    x ^= x << 5
    this.state = x >>> 0
    return this.state / 0x100000000 }}

export const DEFAULT_SEED = 0x7ac4

export interface ExecOptions {
  fill?: boolean                // pad mismatched shapes with per-kind defaults
  seed?: number                 // random primitive seed
  output?: OutputProvider       // where &p writes
  interrupt?: InterruptFlag
  pool?: KernelPool | null      // worker pool for large kernels
}

type FillFrame = { num?: number, char?: string, box?: Value }

const DEFAULT_FILLS: FillFrame = {num: 0, char: '\0', box: ArrC.empty()}

export class ExecContext implements FillContext {
  readonly rng: SeededRNG
  readonly output: OutputProvider
  readonly interrupt: InterruptFlag | null
  readonly pool: KernelPool | null
  private fills: FillFrame[]

  constructor(opts: ExecOptions = {}) {
    this.rng = new SeededRNG(opts.seed ?? DEFAULT_SEED)
    this.output = opts.output ?? new ConsoleOutputProvider()
    this.interrupt = opts.interrupt ?? null
    this.pool = opts.pool ?? null
    this.fills = opts.fill ? [DEFAULT_FILLS] : [] }

  /** raise Interrupted if the flag is set */
  poll = (): void => {
    if (this.interrupt?.raised) throw RtE.interrupted() }

  private find<T>(get: (f: FillFrame) => T | undefined): T | undefined {
    for (let i = this.fills.length - 1; i >= 0; i--) {
      let x = get(this.fills[i])
      if (x !== undefined) return x }
    return undefined }

  numFill(): number | undefined { return this.find(f => f.num) }
  charFill(): string | undefined { return this.find(f => f.char) }
  boxFill(): Value | undefined { return this.find(f => f.box) }

  /** make a scalar the fill value of its kind until the matching popFill */
  pushFill(v: Value): void {
    if (!v.isScalar) throw RtE.type('fill value must be a scalar', v)
    switch (v.kind) {
      case Kind.BYTE: case Kind.NUM: this.fills.push({num: v.data[0]}); break
      case Kind.CHAR: this.fills.push({char: v.data[0]}); break
      case Kind.BOX: this.fills.push({box: v.data[0]}); break }}

  popFill(): void { this.fills.pop() }}
