// MCP tool definitions and handlers over the public entry points
import {compile, run, evaluate, spanPosition, showStack, disassemble, type ExecOptions, type Value} from './tk.mjs'
import {TackError, LexError, CompileError, RuntimeError} from './tk-errors.mjs'
import {CaptureOutputProvider} from './tk-context.mjs'
import {PRIMS, findPrim, primText, type PrimDef} from './tk-prims.mjs'
import {showSig} from './tk-core.mjs'

type Prop = { type: 'string', description: string }

export type ToolDef = {
  name: string
  description: string
  inputSchema: { type: 'object', properties: Record<string, Prop>, required?: string[] }
}

export type ToolResult = {
  content: Array<{ type: 'text', text: string }>
  isError?: boolean
}

export const TOOLS: ToolDef[] = [
  {
    name: 'eval_tack',
    description: 'Evaluate Tack code and return the final stack, one value per line with the top last. ' +
      'Lines printed with &p come first.',
    inputSchema: {
      type: 'object',
      properties: {
        code: {type: 'string', description: 'The Tack code to run'},
        stack: {type: 'string', description: 'Tack code whose results form the initial stack'},
      },
      required: ['code'],
    },
  },
  {
    name: 'compile_tack',
    description: 'Compile Tack code and list its bytecode without running it.',
    inputSchema: {
      type: 'object',
      properties: {code: {type: 'string', description: 'The Tack code to compile'}},
      required: ['code'],
    },
  },
  {
    name: 'list_primitives',
    description: 'List every primitive with its glyph, name, class and stack signature.',
    inputSchema: {type: 'object', properties: {}},
  },
  {
    name: 'inspect_primitive',
    description: 'Describe one primitive, looked up by glyph, ascii spelling or name.',
    inputSchema: {
      type: 'object',
      properties: {primitive: {type: 'string', description: 'Glyph or name, e.g. "/" or "reduce"'}},
      required: ['primitive'],
    },
  },
]

let text = (t: string, isError = false): ToolResult =>
  isError ? {content: [{type: 'text', text: t}], isError} : {content: [{type: 'text', text: t}]}

function param(args: Record<string, unknown> | undefined, key: string): string {
  let v = args?.[key]
  if (typeof v !== 'string' || v === '') throw new Error(`${key} parameter is required`)
  return v }

/** "Kind Code at line:col: message" */
export function describeError(e: TackError, source: string): string {
  let code = e instanceof LexError || e instanceof CompileError || e instanceof RuntimeError ? ` ${e.code}` : ''
  let where = ''
  if (e.span) {
    let {line, col} = spanPosition(source, e.span.start)
    where = ` at ${line}:${col}` }
  return `${e.name}${code}${where}: ${e.message}` }

export function describePrim(d: PrimDef): string {
  let lines = [
    `${primText(d.prim)} ${d.name}`,
    `class: ${d.cls}`,
    d.sig ? `signature: ${showSig(d.sig)}` : `operands: ${d.operands}`]
  if (d.ascii) lines.push(`ascii: ${d.ascii}`)
  return lines.join('\n') }

function evalTool(code: string, stackSrc: string | undefined, opts: ExecOptions): ToolResult {
  let out = new CaptureOutputProvider()
  let o = {...opts, output: out}
  let initial: Value[] = []
  if (stackSrc !== undefined) {
    let s = evaluate(stackSrc, [], o)
    if (!s.ok) return text(`stack: ${describeError(s.error, stackSrc)}`, true)
    initial = s.value }
  let p = compile(code)
  if (!p.ok) return text(describeError(p.error, code), true)
  let r = run(p.value, initial, o)
  let printed = out.take()
  if (!r.ok) return text([...printed, describeError(r.error, code)].join('\n'), true)
  return text([...printed, showStack(r.value)].join('\n')) }

/** run one tool; failures come back as an error result rather than a rejection */
export function handleToolCall(name: string, args: Record<string, unknown> | undefined,
                               opts: ExecOptions = {}): ToolResult {
  try {
    switch (name) {
      case 'eval_tack': {
        let stack = args?.stack
        return evalTool(param(args, 'code'), typeof stack === 'string' && stack !== '' ? stack : undefined, opts) }
      case 'compile_tack': {
        let code = param(args, 'code'), p = compile(code)
        return p.ok ? text(disassemble(p.value)) : text(describeError(p.error, code), true) }
      case 'list_primitives':
        return text(PRIMS.map(d => `${primText(d.prim)}\t${d.name}\t${d.cls}\t${d.sig ? showSig(d.sig) : `operands ${d.operands}`}`).join('\n'))
      case 'inspect_primitive': {
        let q = param(args, 'primitive'), d = findPrim(q)
        return d ? text(describePrim(d)) : text(`unknown primitive: ${q}`, true) }
      default:
        throw new Error(`Unknown tool: ${name}`) }}
  catch (error) {
    let message = error instanceof Error ? error.message : String(error)
    return text(`Error: ${message}`, true) }}
