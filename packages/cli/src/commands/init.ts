import { basename } from 'node:path'
import type { AppSpec, AppSpecError, Result } from 'shared'
import { APP_SPEC_FILE, appSpecPath, newAppSpec, writeAppSpec } from '../lib/app-spec.js'
import { nodeByteStore, type ByteStore } from '../lib/byte-store.js'
import { resolveProjectRoot, type ProjectOptions } from '../lib/config.js'

export interface InitOptions extends ProjectOptions {
  name?: string
  force?: boolean
}

function sanitizeProjectName(dirName: string): string {
  return dirName.toLowerCase().replace(/[^a-z0-9-]/g, '-').replace(/^-+|-+$/g, '') || 'my-app'
}

export async function initCommand(options: InitOptions, store: ByteStore = nodeByteStore): Promise<Result<AppSpec, AppSpecError>> {
  const root = resolveProjectRoot(options)

  // Check if already initialized
  const existing = await store.readAll(appSpecPath(root))
  if (existing.ok && !options.force) {
    return {
      ok: false,
      error: { code: 'INVALID_ARGUMENT', message: `${APP_SPEC_FILE} already exists. Use --force to overwrite.` },
    }
  }
  if (!existing.ok && existing.error.code !== 'NOT_FOUND') return existing

  const spec = newAppSpec(options.name ?? sanitizeProjectName(basename(root)))

  const written = await writeAppSpec(store, root, spec)
  if (!written.ok) return written

  console.error(`✅ Initialized app: ${spec.name}`)
  console.error(`\nNext steps:`)
  console.error(`  appspec registry add <name> <uri>   Add a package registry`)
  console.error(`  appspec env add <name> --server <url>   Add a deployment environment`)

  return { ok: true, value: spec }
}
