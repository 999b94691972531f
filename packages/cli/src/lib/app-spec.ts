import { join } from 'node:path'
import { TextDecoder, TextEncoder } from 'node:util'
import AjvModule from 'ajv'
import { parse as parseYaml, stringify } from 'yaml'
import { appSpecSchema } from 'shared'
import type {
  AppSpec,
  AppSpecError,
  EnvironmentSpec,
  GitVersion,
  LibraryRef,
  RawAppSpec,
  RawEnvironmentSpec,
  RawGitVersion,
  RawLibraryRef,
  RawRegistryRef,
  RegistryRef,
  Result,
} from 'shared'
import type { ByteStore } from './byte-store.js'
import { compareSemver, formatSemver, parseSemver, type SemVer } from './semver.js'

/** Newest document schema this client understands */
export const DEFAULT_API_VERSION = '0.1.0'
export const APP_SPEC_KIND = 'appspec.dev/app'
/** Version given to freshly initialized apps */
export const DEFAULT_APP_VERSION = '0.0.1'
export const APP_SPEC_FILE = 'app.yaml'
export const DEFAULT_FILE_MODE = 0o644
/** Namespace callers apply when an environment names none */
export const DEFAULT_NAMESPACE = 'default'

// Placeholder written by tools that never set a real version
const PLACEHOLDER_API_VERSION = '0.0.0'

const Ajv = AjvModule.default
const ajv = new Ajv({ allErrors: true, allowUnionTypes: true })
const validateShape = ajv.compile(appSpecSchema)

function isRawAppSpec(value: unknown): value is RawAppSpec {
  return validateShape(value)
}

export type ApiVersion = { state: 'unset' } | { state: 'parsed'; version: SemVer }

export function appSpecPath(projectRoot: string): string {
  return join(projectRoot, APP_SPEC_FILE)
}

export function newAppSpec(name: string): AppSpec {
  return {
    apiVersion: DEFAULT_API_VERSION,
    kind: APP_SPEC_KIND,
    name,
    version: DEFAULT_APP_VERSION,
    description: '',
    authors: [],
    contributors: [],
    bugs: '',
    keywords: [],
    registries: {},
    environments: {},
    libraries: {},
    license: '',
  }
}

export function readApiVersion(value: string | null | undefined): Result<ApiVersion, AppSpecError> {
  if (!value || value === PLACEHOLDER_API_VERSION) {
    return { ok: true, value: { state: 'unset' } }
  }

  const parsed = parseSemver(value)
  if (!parsed.ok) {
    return {
      ok: false,
      error: {
        code: 'MALFORMED_VERSION',
        message: `Failed to parse version in app spec: ${parsed.error.message}`,
        cause: parsed.error,
      },
    }
  }
  return { ok: true, value: { state: 'parsed', version: parsed.value } }
}

/**
 * Gate a decoded document on its apiVersion. Documents at or below
 * DEFAULT_API_VERSION pass; newer ones and unset ones are rejected.
 */
export function validateAppSpec(raw: RawAppSpec): Result<void, AppSpecError> {
  const apiVersion = readApiVersion(raw.apiVersion)
  if (!apiVersion.ok) return apiVersion

  if (apiVersion.value.state === 'unset') {
    return { ok: false, error: { code: 'UNSUPPORTED_VERSION', message: 'App spec has no valid apiVersion' } }
  }

  const supported = parseSemver(DEFAULT_API_VERSION)
  if (!supported.ok) return supported

  if (compareSemver(supported.value, apiVersion.value.version) < 0) {
    return {
      ok: false,
      error: {
        code: 'UNSUPPORTED_VERSION',
        message: `Current app uses unsupported spec version '${formatSemver(apiVersion.value.version)}' (this client only supports ${DEFAULT_API_VERSION})`,
      },
    }
  }

  return { ok: true, value: undefined }
}

function text(value: string | null | undefined): string {
  return value ?? ''
}

function toGitVersion(raw: RawGitVersion | null | undefined): GitVersion | undefined {
  if (!raw) return undefined
  return { refSpec: text(raw.refSpec), commitSha: text(raw.commitSha) }
}

function toAppSpec(raw: RawAppSpec): AppSpec {
  const registries = Object.entries<RawRegistryRef>(raw.registries ?? {}).map(([name, entry]): [string, RegistryRef] => {
    const gitVersion = toGitVersion(entry.gitVersion)
    return [name, { name, protocol: text(entry.protocol), uri: text(entry.uri), ...(gitVersion ? { gitVersion } : {}) }]
  })

  const environments = Object.entries<RawEnvironmentSpec>(raw.environments ?? {}).map(([name, entry]): [string, EnvironmentSpec] => [
    name,
    {
      name,
      kubernetesVersion: text(entry.k8sVersion),
      path: text(entry.path),
      destination: {
        server: text(entry.destination?.server),
        namespace: text(entry.destination?.namespace),
      },
      targets: entry.targets ?? [],
    },
  ])

  // The key names a library; a persisted name field is ignored
  const libraries = Object.entries<RawLibraryRef>(raw.libraries ?? {}).map(([name, entry]): [string, LibraryRef] => {
    const gitVersion = toGitVersion(entry.gitVersion)
    return [name, { name, registry: text(entry.registry), ...(gitVersion ? { gitVersion } : {}) }]
  })

  return {
    apiVersion: text(raw.apiVersion),
    kind: text(raw.kind),
    name: text(raw.name),
    version: text(raw.version),
    description: text(raw.description),
    authors: raw.authors ?? [],
    contributors: (raw.contributors ?? []).map(c => ({ name: text(c.name), email: text(c.email) })),
    ...(raw.repository ? { repository: { type: text(raw.repository.type), uri: text(raw.repository.uri) } } : {}),
    bugs: text(raw.bugs),
    keywords: raw.keywords ?? [],
    registries: Object.fromEntries(registries),
    environments: Object.fromEntries(environments),
    libraries: Object.fromEntries(libraries),
    license: text(raw.license),
  }
}

/**
 * Parse app.yaml bytes, check their shape, gate on apiVersion and fill in
 * empty collections.
 */
export function decodeAppSpec(bytes: Uint8Array): Result<AppSpec, AppSpecError> {
  let parsed: unknown
  try {
    const content = new TextDecoder('utf-8', { fatal: true }).decode(bytes)
    parsed = parseYaml(content) ?? {}
  } catch (error) {
    return { ok: false, error: { code: 'DECODE', message: `Failed to parse app spec: ${error}`, cause: error } }
  }

  if (!isRawAppSpec(parsed)) {
    const details = (validateShape.errors ?? [])
      .map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
      .join('; ')
    return { ok: false, error: { code: 'DECODE', message: `Invalid app spec: ${details}` } }
  }

  const valid = validateAppSpec(parsed)
  if (!valid.ok) return valid

  return { ok: true, value: toAppSpec(parsed) }
}

function fromGitVersion(gitVersion: GitVersion | undefined): Record<string, string> | undefined {
  return gitVersion ? { refSpec: gitVersion.refSpec, commitSha: gitVersion.commitSha } : undefined
}

function encodeCollection<T>(
  collection: Record<string, T>,
  encodeEntry: (entry: T) => Record<string, unknown>
): Record<string, unknown> | undefined {
  const names = Object.keys(collection).sort()
  if (names.length === 0) return undefined
  return Object.fromEntries(names.map(name => [name, encodeEntry(collection[name])]))
}

function nonEmpty<T>(values: T[]): T[] | undefined {
  return values.length > 0 ? values : undefined
}

/**
 * Serialize to app.yaml. Entry names are carried by their keys only, and
 * empty fields are left out.
 */
export function encodeAppSpec(spec: AppSpec): Uint8Array {
  const document = {
    apiVersion: spec.apiVersion || undefined,
    kind: spec.kind || undefined,
    name: spec.name || undefined,
    version: spec.version || undefined,
    description: spec.description || undefined,
    authors: nonEmpty(spec.authors),
    contributors: nonEmpty(spec.contributors.map(c => ({ name: c.name, email: c.email }))),
    repository: spec.repository ? { type: spec.repository.type, uri: spec.repository.uri } : undefined,
    bugs: spec.bugs || undefined,
    keywords: nonEmpty(spec.keywords),
    registries: encodeCollection(spec.registries, ref => ({
      protocol: ref.protocol,
      uri: ref.uri,
      gitVersion: fromGitVersion(ref.gitVersion),
    })),
    environments: encodeCollection(spec.environments, env => ({
      k8sVersion: env.kubernetesVersion,
      path: env.path,
      destination: { server: env.destination.server, namespace: env.destination.namespace },
      targets: nonEmpty(env.targets),
    })),
    libraries: encodeCollection(spec.libraries, lib => ({
      registry: lib.registry,
      gitVersion: fromGitVersion(lib.gitVersion),
    })),
    license: spec.license || undefined,
  }

  return new TextEncoder().encode(stringify(document))
}

export async function readAppSpec(store: ByteStore, projectRoot: string): Promise<Result<AppSpec, AppSpecError>> {
  const bytes = await store.readAll(appSpecPath(projectRoot))
  if (!bytes.ok) return bytes
  return decodeAppSpec(bytes.value)
}

export async function writeAppSpec(
  store: ByteStore,
  projectRoot: string,
  spec: AppSpec
): Promise<Result<void, AppSpecError>> {
  return store.writeAll(appSpecPath(projectRoot), encodeAppSpec(spec), DEFAULT_FILE_MODE)
}
