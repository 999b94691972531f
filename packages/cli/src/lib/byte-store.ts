import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { AppSpecError, Result } from 'shared'

/**
 * Reads and writes whole files. The app spec core only ever deals in
 * complete byte buffers at a computed path.
 */
export interface ByteStore {
  readAll(path: string): Promise<Result<Uint8Array, AppSpecError>>
  writeAll(path: string, data: Uint8Array, mode: number): Promise<Result<void, AppSpecError>>
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

export const nodeByteStore: ByteStore = {
  async readAll(path) {
    try {
      return { ok: true, value: await readFile(path) }
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return { ok: false, error: { code: 'NOT_FOUND', message: `File not found: ${path}`, cause: error } }
      }
      return { ok: false, error: { code: 'IO', message: `Failed to read ${path}: ${error}`, cause: error } }
    }
  },

  async writeAll(path, data, mode) {
    try {
      await mkdir(dirname(path), { recursive: true })
      await writeFile(path, data, { mode })
      return { ok: true, value: undefined }
    } catch (error) {
      return { ok: false, error: { code: 'IO', message: `Failed to write ${path}: ${error}`, cause: error } }
    }
  },
}
