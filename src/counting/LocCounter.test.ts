import { describe, it, expect } from 'vitest'
import { LocCounter } from './LocCounter'

describe('LocCounter', () => {
  const counter = new LocCounter()

  describe('countLines', () => {
    it('should handle empty content', () => {
      expect(counter.countLines('')).toBe(0)
    })

    it('should count an unterminated single line', () => {
      expect(counter.countLines('single line')).toBe(1)
    })

    it('should not count a phantom line after the final newline', () => {
      expect(counter.countLines('line1\nline2\n')).toBe(2)
      expect(counter.countLines('line1\nline2')).toBe(2)
    })

    it('should count empty lines as physical lines', () => {
      const content = `line1

line3

line5`

      expect(counter.countLines(content)).toBe(5)
      expect(counter.countLines('\n\n')).toBe(2)
    })

    it('should count CRLF line endings once', () => {
      expect(counter.countLines('a\r\nb\r\nc\r\n')).toBe(3)
    })
  })

  describe('countChars', () => {
    it('should count code points, not UTF-16 units', () => {
      expect(counter.countChars('abc')).toBe(3)
      expect(counter.countChars('é😀')).toBe(2)
      expect(counter.countChars('')).toBe(0)
    })
  })

  describe('decode', () => {
    it('should decode UTF-8 text', () => {
      const result = counter.decode(Buffer.from('const x = 1\n', 'utf8'))
      expect(result).toEqual({ kind: 'text', content: 'const x = 1\n' })
    })

    it('should reject content with NUL bytes', () => {
      const result = counter.decode(Buffer.from([0x61, 0x00, 0x62]))
      expect(result).toEqual({ kind: 'binary', reason: 'contains NUL bytes' })
    })

    it('should reject invalid UTF-8', () => {
      const result = counter.decode(Buffer.from([0xff, 0xfe, 0x41]))
      expect(result).toEqual({ kind: 'binary', reason: 'not valid UTF-8' })
    })
  })
})
