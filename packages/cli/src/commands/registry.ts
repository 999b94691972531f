import type { AppSpecError, RegistryRef, Result } from 'shared'
import { addRegistryRef, deleteRegistryRef, getRegistryRef, getRegistryRefs } from '../lib/collections.js'
import type { ByteStore } from '../lib/byte-store.js'
import type { ProjectOptions } from '../lib/config.js'
import { loadProject, updateProject } from '../lib/project.js'

export interface RegistryAddOptions extends ProjectOptions {
  protocol?: string
  ref?: string
}

export const DEFAULT_REGISTRY_PROTOCOL = 'github'

export async function registryAddCommand(
  name: string,
  uri: string,
  options: RegistryAddOptions = {},
  store?: ByteStore
): Promise<Result<RegistryRef, AppSpecError>> {
  if (!uri) {
    return { ok: false, error: { code: 'INVALID_ARGUMENT', message: 'Registry URI is required' } }
  }

  const ref: RegistryRef = {
    name,
    protocol: options.protocol ?? DEFAULT_REGISTRY_PROTOCOL,
    uri,
    ...(options.ref ? { gitVersion: { refSpec: options.ref, commitSha: '' } } : {}),
  }

  const result = await updateProject(options, (spec): Result<RegistryRef, AppSpecError> => {
    const added = addRegistryRef(spec, ref)
    return added.ok ? { ok: true, value: ref } : added
  }, store)

  if (result.ok) {
    console.error(`✅ Added registry: ${name} → ${uri}`)
  }
  return result
}

export async function registryRemoveCommand(
  name: string,
  options: ProjectOptions = {},
  store?: ByteStore
): Promise<Result<void, AppSpecError>> {
  const result = await updateProject(options, (spec): Result<void, AppSpecError> => {
    if (!getRegistryRef(spec, name)) {
      return { ok: false, error: { code: 'NOT_FOUND', message: `No registry named "${name}"` } }
    }
    deleteRegistryRef(spec, name)
    return { ok: true, value: undefined }
  }, store)

  if (result.ok) {
    console.error(`✅ Removed registry: ${name}`)
  }
  return result
}

export async function registryListCommand(
  options: ProjectOptions & { json?: boolean } = {},
  store?: ByteStore
): Promise<Result<Record<string, RegistryRef>, AppSpecError>> {
  const project = await loadProject(options, store)
  if (!project.ok) return project

  const registries = getRegistryRefs(project.value.spec)
  if (options.json) {
    console.log(JSON.stringify(registries, null, 2))
  } else {
    const entries = Object.values(registries)
    if (entries.length === 0) {
      console.error('No registries configured.')
    } else {
      console.error('\nConfigured registries:')
      for (const ref of entries) {
        const version = ref.gitVersion ? ` (${ref.gitVersion.refSpec})` : ''
        console.error(`  ${ref.name} → ${ref.protocol}:${ref.uri}${version}`)
      }
      console.error('')
    }
  }

  return { ok: true, value: registries }
}
