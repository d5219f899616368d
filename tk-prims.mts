// primitive table: ids, glyphs, spellings and declared signatures
import table from './tk-prims.json' with {type: 'json'}
import {type Signature, sig} from './tk-core.mjs'

/** primitive ids; the order matches tk-prims.json and indexes the implementation table */
export enum Prim {
  Dup, Over, Flip, Pop, Identity,
  Eta, Pi, Tau, Infinity, Random,
  Not, Sign, Neg, Abs, Sqrt, Sin, Cos, Tan, Asin, Acos, Floor, Ceil, Round,
  Eq, Ne, Lt, Le, Gt, Ge, Add, Sub, Mul, Div, Mod, Pow, Log, Min, Max, Atan,
  Len, Shape, Range, First, Reverse, Deshape, Transpose, Rise, Fall,
  Where, Classify, Dedup, Box, Unbox,
  Match, Join, Couple, Select, Pick, Reshape, Take, Drop, Rotate,
  Windows, Keep, Find, Member, IndexOf,
  Reduce, Fold, Scan, Each, Rows, Distribute, Table, Repeat,
  Group, Partition, Both, Dip, Fork, If, Fill,
  Print,
}

export enum PrimClass {
  STACK = 'stack',
  CONSTANT = 'constant',
  MONADIC_PERVASIVE = 'monadic-pervasive',
  DYADIC_PERVASIVE = 'dyadic-pervasive',
  MONADIC_ARRAY = 'monadic-array',
  DYADIC_ARRAY = 'dyadic-array',
  MODIFIER = 'modifier',
  SYSTEM = 'system',
}

export interface PrimDef {
  prim: Prim
  name: string            // spelled-out form, usable as an identifier
  glyph: string | null
  ascii: string | null    // ascii spelling accepted by the lexer
  cls: PrimClass
  sig: Signature | null   // null for modifiers: their effect depends on the operands
  operands: number        // function operands taken by a modifier
}

type RawDef = {
  id: string, name: string, glyph?: string, ascii?: string, class: string,
  args?: number, outputs?: number, operands?: number }

let classOf = (s: string): PrimClass => {
  for (let c of Object.values(PrimClass)) if (c === s) return c
  throw new Error(`tk-prims.json: unknown class '${s}'`) }

function loadDefs(raw: RawDef[]): PrimDef[] {
  return raw.map((r, i): PrimDef => {
    if (Prim[i] !== r.id) throw new Error(`tk-prims.json: entry ${i} is '${r.id}', expected '${Prim[i]}'`)
    let cls = classOf(r.class)
    let hasSig = r.args !== undefined && r.outputs !== undefined
    return {
      prim: i, name: r.name, glyph: r.glyph ?? null, ascii: r.ascii ?? null, cls,
      sig: hasSig ? sig(r.args ?? 0, r.outputs ?? 0) : null,
      operands: r.operands ?? 0 }})}

export const PRIMS: readonly PrimDef[] = loadDefs(table)

let byGlyph = new Map<string, Prim>()
let byName = new Map<string, Prim>()
for (let d of PRIMS) {
  if (d.glyph) byGlyph.set(d.glyph, d.prim)
  if (d.ascii) byGlyph.set(d.ascii, d.prim)
  byName.set(d.name, d.prim) }

export let primDef = (p: Prim): PrimDef => PRIMS[p]
export let primByGlyph = (g: string): Prim | undefined => byGlyph.get(g)
export let primByName = (n: string): Prim | undefined => byName.get(n)
export let isModifier = (p: Prim): boolean => PRIMS[p].cls === PrimClass.MODIFIER

/** glyph if it has one, else the name */
export let primText = (p: Prim): string => PRIMS[p].glyph ?? PRIMS[p].name

/** look a primitive up by glyph, ascii spelling or name */
export function findPrim(text: string): PrimDef | undefined {
  let p = byGlyph.get(text) ?? byName.get(text.toLowerCase())
  return p === undefined ? undefined : PRIMS[p] }
