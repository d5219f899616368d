// optional worker pool for large elementwise kernels.
// the calling thread blocks until every range is written, so the VM never suspends.
import {Worker} from 'node:worker_threads'
import {availableParallelism} from 'node:os'
import {MONADIC, DYADIC, monadicLoop, dyadicLoop, type MonadicName, type DyadicName} from './tk-kernels.mjs'

export const DEFAULT_THRESHOLD = 1 << 16
const TICK_MS = 100

export interface PoolOptions {
  workers?: number     // default: one less than the available cores, at least 1
  threshold?: number   // smallest element count worth splitting
  waitMs?: number      // stop waiting on workers after this long and compute in-thread
}

type Job = {
  kernel: string
  a: SharedArrayBuffer, ra: number
  b: SharedArrayBuffer | null, rb: number
  out: SharedArrayBuffer, ctl: SharedArrayBuffer
  lo: number, hi: number }

let entries = (o: object) => Object.entries(o)
  .map(([k, f]: [string, unknown]) => `  ${JSON.stringify(k)}: ${String(f)},`).join('\n')

function workerSource(): string {
  return `'use strict'
const {parentPort} = require('node:worker_threads')
const MONADIC = {
${entries(MONADIC)}
}
const DYADIC = {
${entries(DYADIC)}
}
const monadicLoop = ${monadicLoop.toString()}
const dyadicLoop = ${dyadicLoop.toString()}
parentPort.on('message', (job) => {
  const ctl = new Int32Array(job.ctl)
  try {
    const out = new Float64Array(job.out)
    if (job.b === null) monadicLoop(MONADIC[job.kernel], new Float64Array(job.a), out, job.lo, job.hi)
    else dyadicLoop(DYADIC[job.kernel], new Float64Array(job.a), job.ra, new Float64Array(job.b), job.rb, out, job.lo, job.hi)
  } catch (e) {
    Atomics.store(ctl, 1, 1)
  }
  Atomics.add(ctl, 0, 1)
  Atomics.notify(ctl, 0)
})
`}

function shared(xs: ArrayLike<number>): SharedArrayBuffer {
  let buf = new SharedArrayBuffer(xs.length * Float64Array.BYTES_PER_ELEMENT)
  new Float64Array(buf).set(xs)
  return buf }

export class KernelPool {
  readonly threshold: number
  private readonly waitMs: number
  private workers: Worker[] = []
  private broken = false
  private closed = false

  constructor(opts: PoolOptions = {}) {
    let n = opts.workers ?? Math.max(1, availableParallelism() - 1)
    this.threshold = opts.threshold ?? DEFAULT_THRESHOLD
    this.waitMs = opts.waitMs ?? 10_000
    let src = workerSource()
    for (let i = 0; i < n; i++) {
      let w = new Worker(src, {eval: true})
      w.unref()
      w.on('error', (e: Error) => this.fail(`worker error: ${e.message}`))
      this.workers.push(w) }}

  get size(): number { return this.workers.length }
  get usable(): boolean { return !this.broken && !this.closed && this.workers.length > 0 }

  private fail(why: string) {
    if (!this.broken) console.warn(`[tack pool] ${why}; computing in-thread from now on`)
    this.broken = true }

  /** f applied to each element, or null when the pool cannot take the job */
  monadic(kernel: MonadicName, a: ArrayLike<number>, poll?: () => void): Float64Array | null {
    return this.split({kernel, a: shared(a), ra: 1, b: null, rb: 1}, a.length, poll) }

  /** dyadic kernel over n result elements, or null when the pool cannot take the job */
  dyadic(kernel: DyadicName, a: ArrayLike<number>, ra: number, b: ArrayLike<number>, rb: number,
         n: number, poll?: () => void): Float64Array | null {
    return this.split({kernel, a: shared(a), ra, b: shared(b), rb}, n, poll) }

  private split(job: Omit<Job, 'out' | 'ctl' | 'lo' | 'hi'>, n: number, poll?: () => void): Float64Array | null {
    if (!this.usable) return null
    let out = new SharedArrayBuffer(n * Float64Array.BYTES_PER_ELEMENT)
    let ctlBuf = new SharedArrayBuffer(2 * Int32Array.BYTES_PER_ELEMENT), ctl = new Int32Array(ctlBuf)
    let parts = Math.min(this.workers.length, Math.max(1, n))
    let chunk = Math.ceil(n / parts), posted = 0
    for (let w = 0; w < parts; w++) {
      let lo = w * chunk, hi = Math.min(n, lo + chunk)
      if (lo >= hi) break
      let msg: Job = {...job, out, ctl: ctlBuf, lo, hi}
      this.workers[w].postMessage(msg)
      posted++ }
    for (let waited = 0; ; waited += TICK_MS) {
      let done = Atomics.load(ctl, 0)
      if (done >= posted) break
      poll?.()
      if (waited >= this.waitMs) { this.fail(`workers did not finish within ${this.waitMs}ms`); return null }
      Atomics.wait(ctl, 0, done, TICK_MS) }
    if (Atomics.load(ctl, 1) !== 0) { this.fail('a kernel failed in a worker'); return null }
    return new Float64Array(out) }

  async close(): Promise<void> {
    this.closed = true
    let ws = this.workers
    this.workers = []
    await Promise.all(ws.map(w => w.terminate())) }}

/** sequential counterparts, used below the threshold and whenever the pool declines */
export function runMonadic(kernel: MonadicName, a: ArrayLike<number>, out: Float64Array): Float64Array {
  monadicLoop(MONADIC[kernel], a, out, 0, out.length)
  return out }

export function runDyadic(kernel: DyadicName, a: ArrayLike<number>, ra: number,
                          b: ArrayLike<number>, rb: number, out: Float64Array): Float64Array {
  dyadicLoop(DYADIC[kernel], a, ra, b, rb, out, 0, out.length)
  return out }
