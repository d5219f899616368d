// core types for the tack pipeline: spans, signatures, results, tokens, syntax tree
import type {Prim} from './tk-prims.mjs'

export type Span = { start: number, end: number }

export let span = (start: number, end: number): Span => ({start, end})

/** 1-based line and column of a source offset, for reporters */
export function spanPosition(source: string, offset: number): {line: number, col: number} {
  let line = 1, col = 1
  for (let i = 0; i < offset && i < source.length; i++) {
    if (source[i] === '\n') { line++; col = 1 }
    else col++ }
  return {line, col} }

// net stack effect: values consumed, values produced
export type Signature = { args: number, outputs: number }
export let sig = (args: number, outputs: number): Signature => ({args, outputs})
export let showSig = (s: Signature | null): string =>
  s ? `|${s.args}.${s.outputs}` : '|dynamic'

export interface Ok<T> { ok: true, value: T }
export interface Err<E> { ok: false, error: E }
export type Result<T, E> = Ok<T> | Err<E>

export const ok = <T,>(value: T): Ok<T> => ({ok: true, value})
export const err = <E,>(error: E): Err<E> => ({ok: false, error})

// ---- tokens

export enum TokT {
  NUM = 'NUM',       // number literal
  CHR = 'CHR',       // character literal
  STR = 'STR',       // string literal
  IDENT = 'IDENT',   // name (bindings, spelled-out primitives, &sys)
  PRIM = 'PRIM',     // function glyph
  MOD = 'MOD',       // modifier glyph
  OPEN = 'OPEN',     // ( [ {
  CLOSE = 'CLOSE',   // ) ] }
  STRAND = 'STRAND', // _
  ARROW = 'ARROW',   // ←
  NL = 'NL',         // line separator
}

export type Opener = '(' | '[' | '{'
export type Closer = ')' | ']' | '}'

export type TokNum = [TokT.NUM, Span, number]
export type TokChr = [TokT.CHR, Span, string]
export type TokStr = [TokT.STR, Span, string]
export type TokIdent = [TokT.IDENT, Span, string]
export type TokPrim = [TokT.PRIM, Span, Prim]
export type TokMod = [TokT.MOD, Span, Prim]
export type TokOpen = [TokT.OPEN, Span, Opener]
export type TokClose = [TokT.CLOSE, Span, Closer]
export type TokStrand = [TokT.STRAND, Span, null]
export type TokArrow = [TokT.ARROW, Span, null]
export type TokNl = [TokT.NL, Span, null]

export type Token
  = TokNum | TokChr | TokStr | TokIdent | TokPrim | TokMod
  | TokOpen | TokClose | TokStrand | TokArrow | TokNl

// ---- syntax tree

export enum NodeT {
  TOP = 'TOP',       // whole program
  LINE = 'LINE',     // words run right to left
  BIND = 'BIND',     // Name ← words
  NUM = 'NUM',
  CHR = 'CHR',
  STR = 'STR',
  IDENT = 'IDENT',
  PRIM = 'PRIM',
  MOD = 'MOD',       // modifier applied to function operands
  STRAND = 'STRAND', // a_b_c
  ARR = 'ARR',       // [...] or {...}
  FUNC = 'FUNC',     // (...)
}

export type ModA = { span: Span, prim: Prim }
export type ArrA = { span: Span, boxed: boolean }
export type BindA = { span: Span, name: string, nameSpan: Span }

export type NumNode = [NodeT.NUM, Span, number]
export type ChrNode = [NodeT.CHR, Span, string]
export type StrNode = [NodeT.STR, Span, string]
export type IdentNode = [NodeT.IDENT, Span, string]
export type PrimNode = [NodeT.PRIM, Span, Prim]
export type ModNode = [NodeT.MOD, ModA, Word[]]
export type StrandNode = [NodeT.STRAND, Span, Word[]]
export type ArrNode = [NodeT.ARR, ArrA, Item[]]
export type FuncNode = [NodeT.FUNC, Span, Item[]]
export type LineNode = [NodeT.LINE, Span, Word[]]
export type BindNode = [NodeT.BIND, BindA, Word[]]
export type TopNode = [NodeT.TOP, Span, Item[]]

export type Word
  = NumNode | ChrNode | StrNode | IdentNode | PrimNode
  | ModNode | StrandNode | ArrNode | FuncNode
export type Item = LineNode | BindNode
export type Node = Word | Item | TopNode

export function nodeSpan(x: Node): Span {
  switch (x[0]) {
    case NodeT.MOD: case NodeT.ARR: case NodeT.BIND: return x[1].span
    default: return x[1] }}
