import {describe, it, expect} from 'vitest'
import {Server} from '@modelcontextprotocol/sdk/server/index.js'
import {parseArgs, createServer} from '../tk-mcp.mjs'
import {DEFAULT_SEED} from '../tk-context.mjs'

describe('parseArgs', () => {
  it('defaults to no fill, the default seed and no pool', () => {
    expect(parseArgs([])).toEqual({fill: false, seed: DEFAULT_SEED, workers: 0})
  })

  it('reads every flag', () => {
    expect(parseArgs(['--fill', '--seed', '7', '--workers', '2', '--threshold', '100']))
      .toEqual({fill: true, seed: 7, workers: 2, threshold: 100})
  })

  it('rejects bad counts and unknown flags', () => {
    expect(() => parseArgs(['--seed'])).toThrow('--seed needs a non-negative integer')
    expect(() => parseArgs(['--workers', '-1'])).toThrow('--workers needs a non-negative integer')
    expect(() => parseArgs(['--threshold', '1.5'])).toThrow('--threshold needs a non-negative integer')
    expect(() => parseArgs(['--verbose'])).toThrow('unknown argument: --verbose')
  })
})

describe('createServer', () => {
  it('builds a server without connecting it', () => {
    expect(createServer({fill: true})).toBeInstanceOf(Server)
  })
})
