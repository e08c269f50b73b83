import { promises as fs } from 'fs'
import path from 'path'
import { v4 as uuidv4 } from 'uuid'

// Owner-only: the state directory holds paths of the user's projects
const FILE_MODE = 0o600
const DIR_MODE = 0o700

export function tempPathFor(targetPath: string): string {
  return `${targetPath}.tmp-${process.pid}-${uuidv4()}`
}

async function syncDirectory(dirPath: string): Promise<void> {
  let dirHandle: fs.FileHandle | undefined
  try {
    dirHandle = await fs.open(dirPath, 'r')
    await dirHandle.sync()
  } catch {
    // Windows cannot open or fsync a directory
    return
  } finally {
    await dirHandle?.close()
  }
}

/**
 * Replace targetPath in one step: readers see either the old file or the
 * complete new one, never a partial write.
 */
export async function writeFileAtomically(targetPath: string, data: string): Promise<void> {
  const dirPath = path.dirname(targetPath)
  const tempPath = tempPathFor(targetPath)
  const discardTemp = () => fs.rm(tempPath, { force: true }).catch(() => undefined)

  await fs.mkdir(dirPath, { recursive: true, mode: DIR_MODE })

  const fileHandle = await fs.open(tempPath, 'wx', FILE_MODE)
  try {
    await fileHandle.writeFile(data, 'utf8')
    await fileHandle.sync()
  } catch (error) {
    await fileHandle.close()
    await discardTemp()
    throw error
  }
  await fileHandle.close()

  try {
    await fs.rename(tempPath, targetPath)
  } catch (error) {
    await discardTemp()
    throw error
  }

  await syncDirectory(dirPath)
}
