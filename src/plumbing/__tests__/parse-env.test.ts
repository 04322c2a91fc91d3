import { describe, expect, it } from 'vitest'
import { parseList, parseNumber, parsePem } from '../parse-env.ts'

describe('parseNumber', () => {
  it('should parse numbers and fall back on anything else', () => {
    expect(parseNumber('42', 1)).toBe(42)
    expect(parseNumber(undefined, 1)).toBe(1)
    expect(parseNumber('', 1)).toBe(1)
    expect(parseNumber('abc', 1)).toBe(1)
    expect(parseNumber('Infinity', 1)).toBe(1)
  })
})

describe('parseList', () => {
  it('should split, trim and drop empty entries', () => {
    expect(parseList(' a, b ,,c ')).toEqual(['a', 'b', 'c'])
    expect(parseList(undefined)).toEqual([])
  })
})

describe('parsePem', () => {
  it('should turn escaped newlines into real ones', () => {
    expect(parsePem('-----BEGIN KEY-----\\nabc\\n-----END KEY-----')).toBe(
      '-----BEGIN KEY-----\nabc\n-----END KEY-----',
    )
  })

  it('should treat blank values as missing', () => {
    expect(parsePem('   ')).toBeUndefined()
    expect(parsePem(undefined)).toBeUndefined()
  })
})
