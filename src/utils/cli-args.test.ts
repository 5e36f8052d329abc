import { describe, expect, it } from 'vitest'

import { parseCliArgs } from './cli-args.js'

function parse(...args: string[]) {
  return parseCliArgs(['node', 'cli.js', ...args])
}

describe('parseCliArgs', () => {
  it('describes the plugin when no selector is given', () => {
    const parsed = parse()
    expect(parsed.ok && parsed.data).toEqual({ command: 'describe' })
  })

  it('reads selectors in both flag forms', () => {
    const a = parse('--directive', 'image-gallery')
    expect(a.ok && a.data).toEqual({ command: 'directive', name: 'image-gallery' })

    const b = parse('--transform=document')
    expect(b.ok && b.data).toEqual({ command: 'transform', name: 'document' })

    const c = parse('--role', 'figure')
    expect(c.ok && c.data).toEqual({ command: 'role', name: 'figure' })
  })

  it('returns help for -h and --help', () => {
    const a = parse('-h')
    expect(a.ok && a.data).toEqual({ command: 'help' })
    const b = parse('--transform', 'x', '--help')
    expect(b.ok && b.data).toEqual({ command: 'help' })
  })

  it('rejects more than one selector', () => {
    const parsed = parse('--directive', 'image-gallery', '--transform', 'document')
    expect(parsed.ok).toBe(false)
    expect(!parsed.ok && parsed.error.split('\n')[0]).toBe('--transform not allowed with --directive')
  })

  it('rejects a selector without a value', () => {
    const parsed = parse('--directive')
    expect(!parsed.ok && parsed.error.split('\n')[0]).toBe('Missing value for --directive')
  })

  it('rejects unknown options and bare arguments', () => {
    const a = parse('--stage', 'document')
    expect(!a.ok && a.error.split('\n')[0]).toBe('Unknown option: --stage')
    const b = parse('image-gallery')
    expect(!b.ok && b.error.split('\n')[0]).toBe('Unexpected arg: image-gallery')
  })
})
