import { TextDecoder } from 'util'

export type DecodeResult =
  | { kind: 'text'; content: string }
  | { kind: 'binary'; reason: string }

const LINE_FEED = 0x0a
const NUL = 0x00

export class LocCounter {
  private decoder = new TextDecoder('utf-8', { fatal: true })

  /**
   * Count physical lines: every `\n` closes a line, and a non-empty
   * unterminated tail is one more.
   */
  countLines(content: string): number {
    if (!content) return 0
    let lines = 0
    for (let i = 0; i < content.length; i++) {
      if (content.charCodeAt(i) === LINE_FEED) lines++
    }
    return content.charCodeAt(content.length - 1) === LINE_FEED ? lines : lines + 1
  }

  /**
   * Count characters as Unicode code points
   */
  countChars(content: string): number {
    let chars = 0
    for (const _ of content) chars++
    return chars
  }

  /**
   * Decode raw file bytes, rejecting anything that does not look like text
   */
  decode(bytes: Uint8Array): DecodeResult {
    if (bytes.includes(NUL)) {
      return { kind: 'binary', reason: 'contains NUL bytes' }
    }
    try {
      return { kind: 'text', content: this.decoder.decode(bytes) }
    } catch {
      return { kind: 'binary', reason: 'not valid UTF-8' }
    }
  }
}
