import path from 'path'
import extensionList from './extensions.json'

/**
 * Extensions (lower case, without the dot) of the files that count toward a
 * project's line total.
 */
export const RECOGNIZED_EXTENSIONS: ReadonlySet<string> = new Set(extensionList)

export function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase()
}

export function isRecognizedFile(
  filePath: string,
  extensions: ReadonlySet<string> = RECOGNIZED_EXTENSIONS
): boolean {
  const ext = extensionOf(filePath)
  return ext !== '' && extensions.has(ext)
}
