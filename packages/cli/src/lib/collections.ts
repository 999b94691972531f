import type { AppSpec, AppSpecError, EnvironmentSpec, LibraryRef, RegistryRef, Result } from 'shared'

type Named = { name: string }

const OK: Result<void, AppSpecError> = { ok: true, value: undefined }

/**
 * Copy of a collection entry carrying the key it is stored under. Stored
 * entries are never touched by reads.
 */
export function withName<T extends Named>(entry: T, name: string): T {
  return { ...entry, name }
}

function lookup<T extends Named>(collection: Record<string, T>, name: string): T | undefined {
  return Object.hasOwn(collection, name) ? withName(collection[name], name) : undefined
}

// Defined rather than assigned so a name like __proto__ stays an own key
function put<T>(collection: Record<string, T>, name: string, entry: T): void {
  Object.defineProperty(collection, name, { value: entry, enumerable: true, writable: true, configurable: true })
}

function named<T extends Named>(collection: Record<string, T>): Record<string, T> {
  return Object.fromEntries(Object.entries(collection).map(([name, entry]) => [name, withName(entry, name)]))
}

// Registries

export function getRegistryRef(spec: AppSpec, name: string): RegistryRef | undefined {
  return lookup(spec.registries, name)
}

export function getRegistryRefs(spec: AppSpec): Record<string, RegistryRef> {
  return named(spec.registries)
}

export function addRegistryRef(spec: AppSpec, ref: RegistryRef): Result<void, AppSpecError> {
  if (ref.name === '') {
    return { ok: false, error: { code: 'REGISTRY_NAME_INVALID', message: 'Registry name is invalid' } }
  }
  if (Object.hasOwn(spec.registries, ref.name)) {
    return { ok: false, error: { code: 'REGISTRY_EXISTS', message: `Registry with name "${ref.name}" already exists` } }
  }

  put(spec.registries, ref.name, ref)
  return OK
}

export function deleteRegistryRef(spec: AppSpec, name: string): void {
  delete spec.registries[name]
}

// Environments

export function getEnvironmentSpecs(spec: AppSpec): Record<string, EnvironmentSpec> {
  return named(spec.environments)
}

export function getEnvironmentSpec(spec: AppSpec, name: string): EnvironmentSpec | undefined {
  return lookup(spec.environments, name)
}

/**
 * Register an environment. This is what makes an environment part of the
 * app; its files on disk are managed elsewhere.
 */
export function addEnvironmentSpec(spec: AppSpec, env: EnvironmentSpec): Result<void, AppSpecError> {
  if (env.name === '') {
    return { ok: false, error: { code: 'ENVIRONMENT_NAME_INVALID', message: 'Environment name is invalid' } }
  }
  if (Object.hasOwn(spec.environments, env.name)) {
    return {
      ok: false,
      error: { code: 'ENVIRONMENT_EXISTS', message: `Environment with name "${env.name}" already exists` },
    }
  }

  put(spec.environments, env.name, env)
  return OK
}

export function deleteEnvironmentSpec(spec: AppSpec, name: string): void {
  delete spec.environments[name]
}

/**
 * Replace the environment stored under `name` with `env`. A different
 * `env.name` moves the entry; moving onto another existing environment is
 * refused.
 */
export function updateEnvironmentSpec(spec: AppSpec, name: string, env: EnvironmentSpec): Result<void, AppSpecError> {
  if (env.name === '') {
    return { ok: false, error: { code: 'ENVIRONMENT_NAME_INVALID', message: 'Environment name is invalid' } }
  }
  if (!Object.hasOwn(spec.environments, name)) {
    return {
      ok: false,
      error: { code: 'ENVIRONMENT_NOT_EXISTS', message: `Environment with name "${name}" does not exist` },
    }
  }

  if (env.name !== name) {
    if (Object.hasOwn(spec.environments, env.name)) {
      return {
        ok: false,
        error: { code: 'ENVIRONMENT_EXISTS', message: `Environment with name "${env.name}" already exists` },
      }
    }
    deleteEnvironmentSpec(spec, name)
  }

  put(spec.environments, env.name, env)
  return OK
}

// Libraries

export function getLibraryRef(spec: AppSpec, name: string): LibraryRef | undefined {
  return lookup(spec.libraries, name)
}

export function getLibraryRefs(spec: AppSpec): Record<string, LibraryRef> {
  return named(spec.libraries)
}

export function addLibraryRef(spec: AppSpec, ref: LibraryRef): Result<void, AppSpecError> {
  if (ref.name === '') {
    return { ok: false, error: { code: 'LIBRARY_NAME_INVALID', message: 'Library name is invalid' } }
  }
  if (Object.hasOwn(spec.libraries, ref.name)) {
    return { ok: false, error: { code: 'LIBRARY_EXISTS', message: `Library with name "${ref.name}" already exists` } }
  }

  put(spec.libraries, ref.name, ref)
  return OK
}

export function deleteLibraryRef(spec: AppSpec, name: string): void {
  delete spec.libraries[name]
}
