type Nullable<T> = T | null

export interface RawGitVersion {
  refSpec?: Nullable<string>
  commitSha?: Nullable<string>
}

export interface RawRegistryRef {
  protocol?: Nullable<string>
  uri?: Nullable<string>
  gitVersion?: Nullable<RawGitVersion>
}

export interface RawEnvironmentSpec {
  k8sVersion?: Nullable<string>
  path?: Nullable<string>
  destination?: Nullable<{ server?: Nullable<string>; namespace?: Nullable<string> }>
  targets?: Nullable<string[]>
}

export interface RawLibraryRef {
  name?: Nullable<string>
  registry?: Nullable<string>
  gitVersion?: Nullable<RawGitVersion>
}

/**
 * Shape of app.yaml as it sits on disk. Every field may be missing or null;
 * unknown fields are allowed and dropped on conversion.
 */
export interface RawAppSpec {
  apiVersion?: Nullable<string>
  kind?: Nullable<string>
  name?: Nullable<string>
  version?: Nullable<string>
  description?: Nullable<string>
  authors?: Nullable<string[]>
  contributors?: Nullable<{ name?: Nullable<string>; email?: Nullable<string> }[]>
  repository?: Nullable<{ type?: Nullable<string>; uri?: Nullable<string> }>
  bugs?: Nullable<string>
  keywords?: Nullable<string[]>
  registries?: Nullable<Record<string, RawRegistryRef>>
  environments?: Nullable<Record<string, RawEnvironmentSpec>>
  libraries?: Nullable<Record<string, RawLibraryRef>>
  license?: Nullable<string>
}

const optionalString = { type: ['string', 'null'] } as const

const stringList = {
  type: ['array', 'null'],
  items: { type: 'string' },
} as const

const gitVersionSchema = {
  type: ['object', 'null'],
  properties: {
    refSpec: optionalString,
    commitSha: optionalString,
  },
} as const

export const registryRefSchema = {
  type: 'object',
  properties: {
    protocol: optionalString,
    uri: optionalString,
    gitVersion: gitVersionSchema,
  },
} as const

export const environmentSpecSchema = {
  type: 'object',
  properties: {
    k8sVersion: optionalString,
    path: optionalString,
    destination: {
      type: ['object', 'null'],
      properties: {
        server: optionalString,
        namespace: optionalString,
      },
    },
    targets: stringList,
  },
} as const

export const libraryRefSchema = {
  type: 'object',
  properties: {
    name: optionalString,
    registry: optionalString,
    gitVersion: gitVersionSchema,
  },
} as const

export const appSpecSchema = {
  type: 'object',
  properties: {
    apiVersion: optionalString,
    kind: optionalString,
    name: optionalString,
    version: optionalString,
    description: optionalString,
    authors: stringList,
    contributors: {
      type: ['array', 'null'],
      items: {
        type: 'object',
        properties: {
          name: optionalString,
          email: optionalString,
        },
      },
    },
    repository: {
      type: ['object', 'null'],
      properties: {
        type: optionalString,
        uri: optionalString,
      },
    },
    bugs: optionalString,
    keywords: stringList,
    registries: {
      type: ['object', 'null'],
      additionalProperties: registryRefSchema,
    },
    environments: {
      type: ['object', 'null'],
      additionalProperties: environmentSpecSchema,
    },
    libraries: {
      type: ['object', 'null'],
      additionalProperties: libraryRefSchema,
    },
    license: optionalString,
  },
} as const
