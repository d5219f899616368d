/** Tack parser
 * One forward pass over the tokens, one token of lookahead for ← and _.
 */
import {
  NodeT, TokT, nodeSpan, span,
  type Closer, type Item, type ModNode, type Span, type TokOpen, type Token, type TopNode, type Word,
} from './tk-core.mjs'
import {ParseError} from './tk-errors.mjs'
import {type Prim, isModifier, primByName, primDef, primText} from './tk-prims.mjs'

const CLOSERS: Record<'(' | '[' | '{', Closer> = {'(': ')', '[': ']', '{': '}'}

const TERM_STARTS = new Set<TokT>([TokT.NUM, TokT.CHR, TokT.STR, TokT.IDENT, TokT.PRIM, TokT.MOD, TokT.OPEN])

let startsTerm = (t: Token | undefined): boolean => t !== undefined && TERM_STARTS.has(t[0])

/** lowercase spellings of modifiers parse as the modifier */
export function modifierNamed(name: string): Prim | undefined {
  let p = primByName(name)
  return p !== undefined && isModifier(p) ? p : undefined }

function describe(t: Token): string {
  switch (t[0]) {
    case TokT.NUM: return `number ${t[2]}`
    case TokT.CHR: return 'a character literal'
    case TokT.STR: return 'a string literal'
    case TokT.IDENT: return `'${t[2]}'`
    case TokT.PRIM: case TokT.MOD: return `'${primText(t[2])}'`
    case TokT.OPEN: case TokT.CLOSE: return `'${t[2]}'`
    case TokT.STRAND: return "'_'"
    case TokT.ARROW: return "'←'"
    case TokT.NL: return 'end of line' }}

export class TackParser {
  private i = 0
  private readonly end: number

  constructor(private readonly toks: Token[]) {
    let last = toks[toks.length - 1]
    this.end = last ? last[1].end : 0 }

  private peek(): Token | undefined { return this.toks[this.i] }

  private fail(expected: string, t: Token | undefined): never {
    throw new ParseError(expected, t ? describe(t) : 'end of input', t ? t[1] : span(this.end, this.end)) }

  top(): TopNode {
    let items = this.lines()
    let t = this.peek()
    if (t) this.fail('end of input', t)
    return [NodeT.TOP, span(0, this.end), items] }

  private lines(): Item[] {
    let items: Item[] = []
    for (;;) {
      let item = this.line()
      if (item) items.push(item)
      if (this.peek()?.[0] !== TokT.NL) return items
      this.i++ }}

  private line(): Item | null {
    let t = this.peek(), u = this.toks[this.i + 1]
    if (t && t[0] === TokT.IDENT && u && u[0] === TokT.ARROW && modifierNamed(t[2]) === undefined) {
      this.i += 2
      let words = this.words()
      let end = words.length ? nodeSpan(words[words.length - 1]).end : u[1].end
      return [NodeT.BIND, {span: span(t[1].start, end), name: t[2], nameSpan: t[1]}, words] }
    let words = this.words()
    if (!words.length) return null
    return [NodeT.LINE, span(nodeSpan(words[0]).start, nodeSpan(words[words.length - 1]).end), words] }

  private words(): Word[] {
    let ws: Word[] = []
    while (startsTerm(this.peek())) ws.push(this.word())
    let t = this.peek()
    if (t && (t[0] === TokT.ARROW || t[0] === TokT.STRAND)) this.fail('a word', t)
    return ws }

  // two or more terms joined by _ form a strand
  private word(): Word {
    let first = this.term(), parts: Word[] = [first]
    while (this.peek()?.[0] === TokT.STRAND) {
      this.i++
      if (!startsTerm(this.peek())) this.fail("a term after '_'", this.peek())
      parts.push(this.term()) }
    if (parts.length === 1) return first
    return [NodeT.STRAND, span(nodeSpan(first).start, nodeSpan(parts[parts.length - 1]).end), parts] }

  private term(): Word {
    let t = this.peek()
    if (!t) this.fail('a term', t)
    this.i++
    switch (t[0]) {
      case TokT.NUM: return [NodeT.NUM, t[1], t[2]]
      case TokT.CHR: return [NodeT.CHR, t[1], t[2]]
      case TokT.STR: return [NodeT.STR, t[1], t[2]]
      case TokT.PRIM: return [NodeT.PRIM, t[1], t[2]]
      case TokT.MOD: return this.modified(t[2], t[1])
      case TokT.OPEN: return this.group(t)
      case TokT.IDENT: {
        let m = modifierNamed(t[2])
        return m === undefined ? [NodeT.IDENT, t[1], t[2]] : this.modified(m, t[1]) }
      default:
        this.i--
        this.fail('a term', t) }}

  // operands come from the syntax that follows, never from the stack
  private modified(prim: Prim, at: Span): ModNode {
    let ops: Word[] = []
    for (let k = 0; k < primDef(prim).operands; k++) {
      if (!startsTerm(this.peek())) this.fail(`a function for ${primText(prim)}`, this.peek())
      ops.push(this.term()) }
    let end = ops.length ? nodeSpan(ops[ops.length - 1]).end : at.end
    return [NodeT.MOD, {span: span(at.start, end), prim}, ops] }

  private group(open: TokOpen): Word {
    let closer = CLOSERS[open[2]]
    let items = this.lines()
    let t = this.peek()
    if (!t || t[0] !== TokT.CLOSE || t[2] !== closer) this.fail(`'${closer}'`, t)
    this.i++
    let sp = span(open[1].start, t[1].end)
    switch (open[2]) {
      case '(': return [NodeT.FUNC, sp, items]
      case '[': return [NodeT.ARR, {span: sp, boxed: false}, items]
      case '{': return [NodeT.ARR, {span: sp, boxed: true}, items] }}}

/** syntax tree of a token list; throws ParseError */
export let parse = (tokens: Token[]): TopNode => new TackParser(tokens).top()
