/** Tack lexer
 * Converts source text to a flat list of tokens.
 */
import {TokT, type Token, type Span, span} from './tk-core.mjs'
import {LexError, LexCode} from './tk-errors.mjs'
import {primByGlyph, isModifier} from './tk-prims.mjs'

export enum Lx { WS, COMMENT, NL, NUM, CHR, STR, SYS, IDENT, ARROW, STRAND, OPEN, CLOSE, GLYPH }

// Lexer table: the first rule whose regex matches at the current position wins
export const lexerTable: Array<[Lx, RegExp]> = [
  [Lx.WS,      /^[ \t\r]+/],
  [Lx.COMMENT, /^#[^\n]*/],
  [Lx.NL,      /^\n/],
  [Lx.NUM,     /^[¯`]?\d+(\.\d+)?([eE][¯`-]?\d+)?/],   // ¯ or ` is the negative sign
  [Lx.CHR,     /^@/],
  [Lx.STR,     /^"/],
  [Lx.SYS,     /^&[a-zA-Z]+/],
  [Lx.IDENT,   /^[a-zA-Z]+/],
  [Lx.ARROW,   /^←/],
  [Lx.STRAND,  /^_/],
  [Lx.OPEN,    /^[([{]/],
  [Lx.CLOSE,   /^[)\]}]/],
  [Lx.GLYPH,   /^(!=|<=|>=|.)/su],                     // one glyph, or a two-character ascii spelling
]

const ESCAPES: Record<string, string> = {
  n: '\n', t: '\t', r: '\r', '0': '\0', '\\': '\\', '"': '"', "'": "'", s: ' ' }

export class TackLexer {
  pos = 0
  out: Token[] = []
  constructor(readonly src: string) {}

  err(code: LexCode, reason: string, at: Span): never { throw new LexError(code, reason, at) }

  // one code point at i (strings may hold characters outside the basic plane)
  charAt(i: number): string { return String.fromCodePoint(this.src.codePointAt(i) ?? 0) }

  escape(i: number): [string, number] {
    let c = this.src[i + 1]
    if (c === undefined || c === '\n') this.err(LexCode.BAD_ESCAPE, 'escape at end of line', span(i, i + 1))
    let e = ESCAPES[c]
    if (e === undefined) this.err(LexCode.BAD_ESCAPE, `unknown escape \\${c}`, span(i, i + 2))
    return [e, i + 2] }

  str(start: number): number {
    let s = '', i = start + 1
    for (;;) {
      let c = this.src[i]
      if (c === undefined || c === '\n')
        this.err(LexCode.UNTERMINATED_STRING, 'string is missing its closing quote', span(start, i))
      if (c === '"') break
      if (c === '\\') { let [e, j] = this.escape(i); s += e; i = j; continue }
      let ch = this.charAt(i); s += ch; i += ch.length }
    this.out.push([TokT.STR, span(start, i + 1), s])
    return i + 1 }

  chr(start: number): number {
    let i = start + 1
    if (i >= this.src.length) this.err(LexCode.UNTERMINATED_CHAR, 'character literal at end of input', span(start, i))
    let [c, end]: [string, number] = this.src[i] === '\\' ? this.escape(i) : [this.charAt(i), i + this.charAt(i).length]
    this.out.push([TokT.CHR, span(start, end), c])
    return end }

  num(text: string, start: number): number {
    let end = start + text.length
    if (/^[a-zA-Z]/.test(this.src.slice(end, end + 1)))
      this.err(LexCode.MALFORMED_NUMBER, `malformed number '${text}${this.src.slice(end).match(/^[a-zA-Z0-9]*/)?.[0] ?? ''}'`,
               span(start, end + 1))
    this.out.push([TokT.NUM, span(start, end), Number(text.replace(/[¯`]/g, '-'))])
    return end }

  glyph(text: string, start: number): number {
    let end = start + text.length, p = primByGlyph(text)
    if (p === undefined) this.err(LexCode.UNRECOGNIZED, `unrecognized character '${text}'`, span(start, end))
    this.out.push(isModifier(p) ? [TokT.MOD, span(start, end), p] : [TokT.PRIM, span(start, end), p])
    return end }

  next(): void {
    let rest = this.src.slice(this.pos), at = this.pos
    for (let [rule, re] of lexerTable) {
      let m = rest.match(re)
      if (!m) continue
      let text = m[0], end = at + text.length
      switch (rule) {
        case Lx.WS: case Lx.COMMENT: this.pos = end; return
        case Lx.NL: this.out.push([TokT.NL, span(at, end), null]); this.pos = end; return
        case Lx.NUM: this.pos = this.num(text, at); return
        case Lx.CHR: this.pos = this.chr(at); return
        case Lx.STR: this.pos = this.str(at); return
        case Lx.SYS: case Lx.IDENT: this.out.push([TokT.IDENT, span(at, end), text]); this.pos = end; return
        case Lx.ARROW: this.out.push([TokT.ARROW, span(at, end), null]); this.pos = end; return
        case Lx.STRAND: this.out.push([TokT.STRAND, span(at, end), null]); this.pos = end; return
        case Lx.OPEN:
          if (text === '(' || text === '[' || text === '{') this.out.push([TokT.OPEN, span(at, end), text])
          this.pos = end; return
        case Lx.CLOSE:
          if (text === ')' || text === ']' || text === '}') this.out.push([TokT.CLOSE, span(at, end), text])
          this.pos = end; return
        case Lx.GLYPH: this.pos = this.glyph(text, at); return }}
    this.err(LexCode.UNRECOGNIZED, 'unrecognized input', span(at, at + 1)) }

  run(): Token[] {
    while (this.pos < this.src.length) this.next()
    return this.out }}

/** tokens of `src`; throws LexError */
export let tokenize = (src: string): Token[] => new TackLexer(src).run()
