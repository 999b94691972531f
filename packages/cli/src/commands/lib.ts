import type { AppSpecError, LibraryRef, Result } from 'shared'
import { addLibraryRef, deleteLibraryRef, getLibraryRef, getLibraryRefs, getRegistryRef } from '../lib/collections.js'
import type { ByteStore } from '../lib/byte-store.js'
import type { ProjectOptions } from '../lib/config.js'
import { loadProject, updateProject } from '../lib/project.js'

export interface LibAddOptions extends ProjectOptions {
  registry?: string
  ref?: string
  commit?: string
}

export async function libAddCommand(
  name: string,
  options: LibAddOptions,
  store?: ByteStore
): Promise<Result<LibraryRef, AppSpecError>> {
  const registry = options.registry
  if (!registry) {
    return { ok: false, error: { code: 'INVALID_ARGUMENT', message: 'Library registry is required (--registry)' } }
  }

  const ref: LibraryRef = {
    name,
    registry,
    ...(options.ref || options.commit
      ? { gitVersion: { refSpec: options.ref ?? '', commitSha: options.commit ?? '' } }
      : {}),
  }

  const result = await updateProject(options, (spec): Result<LibraryRef, AppSpecError> => {
    if (!getRegistryRef(spec, registry)) {
      return { ok: false, error: { code: 'NOT_FOUND', message: `No registry named "${registry}"` } }
    }
    const added = addLibraryRef(spec, ref)
    return added.ok ? { ok: true, value: ref } : added
  }, store)

  if (result.ok) {
    console.error(`✅ Added library: ${name} from ${registry}`)
  }
  return result
}

export async function libRemoveCommand(
  name: string,
  options: ProjectOptions = {},
  store?: ByteStore
): Promise<Result<void, AppSpecError>> {
  const result = await updateProject(options, (spec): Result<void, AppSpecError> => {
    if (!getLibraryRef(spec, name)) {
      return { ok: false, error: { code: 'NOT_FOUND', message: `No library named "${name}"` } }
    }
    deleteLibraryRef(spec, name)
    return { ok: true, value: undefined }
  }, store)

  if (result.ok) {
    console.error(`✅ Removed library: ${name}`)
  }
  return result
}

export async function libListCommand(
  options: ProjectOptions & { json?: boolean } = {},
  store?: ByteStore
): Promise<Result<Record<string, LibraryRef>, AppSpecError>> {
  const project = await loadProject(options, store)
  if (!project.ok) return project

  const libraries = getLibraryRefs(project.value.spec)
  if (options.json) {
    console.log(JSON.stringify(libraries, null, 2))
  } else {
    const entries = Object.values(libraries)
    if (entries.length === 0) {
      console.error('No libraries installed.')
    } else {
      console.error('\nLibraries:')
      for (const lib of entries) {
        const pin = lib.gitVersion ? `@${lib.gitVersion.commitSha || lib.gitVersion.refSpec}` : ''
        console.error(`  ${lib.name} (${lib.registry})${pin}`)
      }
      console.error('')
    }
  }

  return { ok: true, value: libraries }
}
