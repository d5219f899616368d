// numeric kernels. each one uses only its parameters and Math, so its source
// text can be handed to pool workers as is.

export type Monadic = (a: number) => number
/** `a` is the top of the stack, `b` the value below it */
export type Dyadic = (a: number, b: number) => number

export const MONADIC = {
  not: (a: number) => 1 - a,
  sign: (a: number) => Math.sign(a),
  neg: (a: number) => -a,
  abs: (a: number) => Math.abs(a),
  sqrt: (a: number) => Math.sqrt(a),
  sin: (a: number) => Math.sin(a),
  cos: (a: number) => Math.cos(a),
  tan: (a: number) => Math.tan(a),
  asin: (a: number) => Math.asin(a),
  acos: (a: number) => Math.acos(a),
  floor: (a: number) => Math.floor(a),
  ceil: (a: number) => Math.ceil(a),
  round: (a: number) => Math.sign(a) * Math.round(Math.abs(a)),
} satisfies Record<string, Monadic>

export const DYADIC = {
  eq: (a: number, b: number) => b === a ? 1 : 0,
  ne: (a: number, b: number) => b !== a ? 1 : 0,
  lt: (a: number, b: number) => b < a ? 1 : 0,
  le: (a: number, b: number) => b <= a ? 1 : 0,
  gt: (a: number, b: number) => b > a ? 1 : 0,
  ge: (a: number, b: number) => b >= a ? 1 : 0,
  add: (a: number, b: number) => b + a,
  sub: (a: number, b: number) => b - a,
  mul: (a: number, b: number) => b * a,
  div: (a: number, b: number) => b / a,
  mod: (a: number, b: number) => b - a * Math.floor(b / a),
  pow: (a: number, b: number) => Math.pow(b, a),
  log: (a: number, b: number) => Math.log(b) / Math.log(a),
  min: (a: number, b: number) => Math.min(a, b),
  max: (a: number, b: number) => Math.max(a, b),
  atan: (a: number, b: number) => Math.atan2(b, a),
} satisfies Record<string, Dyadic>

export type MonadicName = keyof typeof MONADIC
export type DyadicName = keyof typeof DYADIC

/** out[i] = f(a[i]) for i in [lo, hi) */
export const monadicLoop = (f: Monadic, a: ArrayLike<number>, out: Float64Array, lo: number, hi: number): void => {
  for (let i = lo; i < hi; i++) out[i] = f(a[i])
}

/**
 * out[i] = f(a[floor(i / ra)], b[floor(i / rb)]) for i in [lo, hi).
 * ra and rb repeat the elements of an operand whose shape is a prefix of the result's.
 */
export const dyadicLoop = (f: Dyadic, a: ArrayLike<number>, ra: number, b: ArrayLike<number>, rb: number,
                           out: Float64Array, lo: number, hi: number): void => {
  if (ra === 1 && rb === 1) { for (let i = lo; i < hi; i++) out[i] = f(a[i], b[i]); return }
  for (let i = lo; i < hi; i++) out[i] = f(a[Math.floor(i / ra)], b[Math.floor(i / rb)])
}
