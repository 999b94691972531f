import { resolve } from 'node:path'

export interface ProjectOptions {
  dir?: string
}

export const PROJECT_DIR_ENV = 'APPSPEC_DIR'

/**
 * Resolve the project root: --dir first, then APPSPEC_DIR, then the
 * working directory.
 */
export function resolveProjectRoot(options: ProjectOptions = {}, env: NodeJS.ProcessEnv = process.env): string {
  const dir = options.dir || env[PROJECT_DIR_ENV]
  return dir ? resolve(process.cwd(), dir) : process.cwd()
}
