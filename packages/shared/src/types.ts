export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export type AppSpecErrorCode =
  | 'MALFORMED_VERSION'
  | 'UNSUPPORTED_VERSION'
  | 'DECODE'
  | 'REGISTRY_NAME_INVALID'
  | 'REGISTRY_EXISTS'
  | 'ENVIRONMENT_NAME_INVALID'
  | 'ENVIRONMENT_EXISTS'
  | 'ENVIRONMENT_NOT_EXISTS'
  | 'LIBRARY_NAME_INVALID'
  | 'LIBRARY_EXISTS'
  | 'NOT_FOUND'
  | 'IO'
  | 'INVALID_ARGUMENT'

export interface AppSpecError {
  code: AppSpecErrorCode
  message: string
  cause?: unknown
}

export interface GitVersion {
  refSpec: string
  commitSha: string
}

export interface Contributor {
  name: string
  email: string
}

export interface Repository {
  type: string
  uri: string
}

/**
 * A registry is a named source of library parts. `name` always mirrors the
 * key the entry is stored under and is never written to disk.
 */
export interface RegistryRef {
  name: string
  protocol: string
  uri: string
  gitVersion?: GitVersion
}

export interface EnvironmentDestination {
  /** Address of the cluster API server */
  server: string
  /** Empty means the caller has not applied a namespace yet */
  namespace: string
}

export interface EnvironmentSpec {
  name: string
  kubernetesVersion: string
  /** Project-relative directory holding this environment's metadata */
  path: string
  destination: EnvironmentDestination
  /** Project-relative component paths deployed to the destination */
  targets: string[]
}

export interface LibraryRef {
  name: string
  registry: string
  gitVersion?: GitVersion
}

export interface AppSpec {
  apiVersion: string
  kind: string
  name: string
  version: string
  description: string
  authors: string[]
  contributors: Contributor[]
  repository?: Repository
  bugs: string
  keywords: string[]
  registries: Record<string, RegistryRef>
  environments: Record<string, EnvironmentSpec>
  libraries: Record<string, LibraryRef>
  license: string
}
