import type { AppSpecError, Result } from 'shared'

export interface SemVer {
  major: bigint
  minor: bigint
  patch: bigint
  prerelease: (string | bigint)[]
  build: string[]
}

export type Ordering = -1 | 0 | 1

const SEMVER_PATTERN =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-((?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*)(?:\.(?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*))*))?(?:\+([0-9a-zA-Z-]+(?:\.[0-9a-zA-Z-]+)*))?$/

function parseIdentifier(identifier: string): string | bigint {
  return /^\d+$/.test(identifier) ? BigInt(identifier) : identifier
}

export function parseSemver(text: string): Result<SemVer, AppSpecError> {
  const match = SEMVER_PATTERN.exec(text)
  if (!match) {
    return { ok: false, error: { code: 'MALFORMED_VERSION', message: `Invalid semantic version: "${text}"` } }
  }

  const [, major, minor, patch, prerelease, build] = match
  return {
    ok: true,
    value: {
      major: BigInt(major),
      minor: BigInt(minor),
      patch: BigInt(patch),
      prerelease: prerelease ? prerelease.split('.').map(parseIdentifier) : [],
      build: build ? build.split('.') : [],
    },
  }
}

export function formatSemver(version: SemVer): string {
  let text = `${version.major}.${version.minor}.${version.patch}`
  if (version.prerelease.length > 0) text += `-${version.prerelease.join('.')}`
  if (version.build.length > 0) text += `+${version.build.join('.')}`
  return text
}

function compareNumbers(a: bigint | number, b: bigint | number): Ordering {
  if (a === b) return 0
  return a < b ? -1 : 1
}

function compareIdentifiers(a: string | bigint, b: string | bigint): Ordering {
  if (typeof a === 'bigint' && typeof b === 'bigint') return compareNumbers(a, b)
  // Numeric identifiers always have lower precedence than alphanumeric ones
  if (typeof a === 'bigint') return -1
  if (typeof b === 'bigint') return 1
  if (a === b) return 0
  return a < b ? -1 : 1
}

/**
 * Orders two parsed versions by semantic-versioning precedence. Build
 * metadata does not take part in the comparison.
 */
export function compareSemver(a: SemVer, b: SemVer): Ordering {
  const core = compareNumbers(a.major, b.major) || compareNumbers(a.minor, b.minor) || compareNumbers(a.patch, b.patch)
  if (core !== 0) return core

  // A release outranks any of its pre-releases
  if (a.prerelease.length === 0 || b.prerelease.length === 0) {
    return compareNumbers(b.prerelease.length === 0 ? 0 : 1, a.prerelease.length === 0 ? 0 : 1)
  }

  const shared = Math.min(a.prerelease.length, b.prerelease.length)
  for (let i = 0; i < shared; i++) {
    const order = compareIdentifiers(a.prerelease[i], b.prerelease[i])
    if (order !== 0) return order
  }
  return compareNumbers(a.prerelease.length, b.prerelease.length)
}

export function compareVersions(a: string, b: string): Result<Ordering, AppSpecError> {
  const left = parseSemver(a)
  if (!left.ok) return left
  const right = parseSemver(b)
  if (!right.ok) return right
  return { ok: true, value: compareSemver(left.value, right.value) }
}
