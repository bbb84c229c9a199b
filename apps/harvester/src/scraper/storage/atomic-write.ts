import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'

/**
 * Replace `path` with `contents` via a sibling temp file and a rename, so
 * readers see either the old file or the new one, never a partial write.
 * Parent directories are created as needed.
 */
export async function writeFileAtomic(path: string, contents: string | Buffer): Promise<void> {
  const dir = dirname(path)
  await mkdir(dir, { recursive: true })

  const tempPath = join(dir, `.${basename(path)}.${process.pid}.${Date.now()}.tmp`)
  try {
    await writeFile(tempPath, contents)
    await rename(tempPath, path)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw error
  }
}
