import type { AppSpecError, EnvironmentSpec, Result } from 'shared'
import { DEFAULT_NAMESPACE } from '../lib/app-spec.js'
import {
  addEnvironmentSpec,
  deleteEnvironmentSpec,
  getEnvironmentSpec,
  getEnvironmentSpecs,
  updateEnvironmentSpec,
} from '../lib/collections.js'
import type { ByteStore } from '../lib/byte-store.js'
import type { ProjectOptions } from '../lib/config.js'
import { loadProject, updateProject } from '../lib/project.js'

export interface EnvAddOptions extends ProjectOptions {
  server?: string
  namespace?: string
  k8sVersion?: string
  path?: string
  target?: string[]
}

export interface EnvSetOptions extends ProjectOptions {
  name?: string
  server?: string
  namespace?: string
  k8sVersion?: string
}

function missingEnvironment(name: string): Result<never, AppSpecError> {
  return { ok: false, error: { code: 'ENVIRONMENT_NOT_EXISTS', message: `Environment "${name}" does not exist` } }
}

export async function envAddCommand(
  name: string,
  options: EnvAddOptions,
  store?: ByteStore
): Promise<Result<EnvironmentSpec, AppSpecError>> {
  if (!options.server) {
    return { ok: false, error: { code: 'INVALID_ARGUMENT', message: 'Environment server is required (--server)' } }
  }

  const env: EnvironmentSpec = {
    name,
    kubernetesVersion: options.k8sVersion ?? '',
    path: options.path ?? `environments/${name}`,
    destination: { server: options.server, namespace: options.namespace || DEFAULT_NAMESPACE },
    targets: options.target ?? [],
  }

  const result = await updateProject(options, (spec): Result<EnvironmentSpec, AppSpecError> => {
    const added = addEnvironmentSpec(spec, env)
    return added.ok ? { ok: true, value: env } : added
  }, store)

  if (result.ok) {
    console.error(`✅ Added environment: ${name} → ${env.destination.server} (${env.destination.namespace})`)
  }
  return result
}

export async function envRemoveCommand(
  name: string,
  options: ProjectOptions = {},
  store?: ByteStore
): Promise<Result<void, AppSpecError>> {
  const result = await updateProject(options, (spec): Result<void, AppSpecError> => {
    if (!getEnvironmentSpec(spec, name)) return missingEnvironment(name)
    deleteEnvironmentSpec(spec, name)
    return { ok: true, value: undefined }
  }, store)

  if (result.ok) {
    console.error(`✅ Removed environment: ${name}`)
  }
  return result
}

/**
 * Change an environment's destination or version, or rename it with --name.
 */
export async function envSetCommand(
  name: string,
  options: EnvSetOptions,
  store?: ByteStore
): Promise<Result<EnvironmentSpec, AppSpecError>> {
  const result = await updateProject(options, (spec): Result<EnvironmentSpec, AppSpecError> => {
    const current = getEnvironmentSpec(spec, name)
    if (!current) return missingEnvironment(name)

    const updated: EnvironmentSpec = {
      ...current,
      name: options.name ?? current.name,
      kubernetesVersion: options.k8sVersion ?? current.kubernetesVersion,
      destination: {
        server: options.server ?? current.destination.server,
        namespace: options.namespace ?? current.destination.namespace,
      },
    }

    const changed = updateEnvironmentSpec(spec, name, updated)
    return changed.ok ? { ok: true, value: updated } : changed
  }, store)

  if (result.ok) {
    console.error(`✅ Updated environment: ${result.value.name}`)
  }
  return result
}

export async function envListCommand(
  options: ProjectOptions & { json?: boolean } = {},
  store?: ByteStore
): Promise<Result<Record<string, EnvironmentSpec>, AppSpecError>> {
  const project = await loadProject(options, store)
  if (!project.ok) return project

  const environments = getEnvironmentSpecs(project.value.spec)
  if (options.json) {
    console.log(JSON.stringify(environments, null, 2))
  } else {
    const entries = Object.values(environments)
    if (entries.length === 0) {
      console.error('No environments configured.')
    } else {
      console.error('\nEnvironments:')
      for (const env of entries) {
        const version = env.kubernetesVersion ? ` k8s ${env.kubernetesVersion}` : ''
        console.error(`  ${env.name} → ${env.destination.server} (${env.destination.namespace})${version}`)
      }
      console.error('')
    }
  }

  return { ok: true, value: environments }
}
