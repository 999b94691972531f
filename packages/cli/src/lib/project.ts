import type { AppSpec, AppSpecError, Result } from 'shared'
import { APP_SPEC_FILE, readAppSpec, writeAppSpec } from './app-spec.js'
import { nodeByteStore, type ByteStore } from './byte-store.js'
import { resolveProjectRoot, type ProjectOptions } from './config.js'

export interface Project {
  root: string
  spec: AppSpec
}

export async function loadProject(options: ProjectOptions, store: ByteStore = nodeByteStore): Promise<Result<Project, AppSpecError>> {
  const root = resolveProjectRoot(options)
  const spec = await readAppSpec(store, root)
  if (!spec.ok) {
    if (spec.error.code === 'NOT_FOUND') {
      return { ok: false, error: { ...spec.error, message: `No ${APP_SPEC_FILE} in ${root}. Run \`appspec init\` first.` } }
    }
    return spec
  }
  return { ok: true, value: { root, spec: spec.value } }
}

/**
 * Load app.yaml, apply `change` and write the result back. Nothing is
 * written when `change` fails.
 */
export async function updateProject<T>(
  options: ProjectOptions,
  change: (spec: AppSpec) => Result<T, AppSpecError>,
  store: ByteStore = nodeByteStore
): Promise<Result<T, AppSpecError>> {
  const project = await loadProject(options, store)
  if (!project.ok) return project

  const changed = change(project.value.spec)
  if (!changed.ok) return changed

  const written = await writeAppSpec(store, project.value.root, project.value.spec)
  if (!written.ok) return written
  return changed
}
