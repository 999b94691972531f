import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest'
import { access, mkdtemp, rm, readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { parse as parseYaml } from 'yaml'
import { initCommand } from '../src/commands/init.js'
import { createMemoryByteStore } from './fakes.js'

describe('appspec init', () => {
  const dirs: string[] = []

  async function setupDir(): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), 'appspec-init-'))
    dirs.push(dir)
    return dir
  }

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    for (const d of dirs) await rm(d, { recursive: true, force: true })
    dirs.length = 0
  })

  it('writes a new app.yaml', async () => {
    const dir = await setupDir()
    const result = await initCommand({ dir, name: 'guestbook' })
    expect(result.ok).toBe(true)

    const manifest = parseYaml(await readFile(join(dir, 'app.yaml'), 'utf-8'))
    expect(manifest).toEqual({
      apiVersion: '0.1.0',
      kind: 'appspec.dev/app',
      name: 'guestbook',
      version: '0.0.1',
    })
  })

  it('names the app after its directory by default', async () => {
    const dir = await setupDir()
    const appDir = join(dir, 'My Web_App')
    const result = await initCommand({ dir: appDir })
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.name).toBe('my-web-app')
  })

  it('refuses to overwrite without --force', async () => {
    const dir = await setupDir()
    await writeFile(join(dir, 'app.yaml'), 'apiVersion: 0.1.0\nname: existing\n')

    const result = await initCommand({ dir, name: 'new' })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_ARGUMENT')
      expect(result.error.message).toBe('app.yaml already exists. Use --force to overwrite.')
    }
    expect(await readFile(join(dir, 'app.yaml'), 'utf-8')).toBe('apiVersion: 0.1.0\nname: existing\n')
  })

  it('overwrites with --force', async () => {
    const dir = await setupDir()
    await writeFile(join(dir, 'app.yaml'), 'apiVersion: 0.1.0\nname: existing\n')

    const result = await initCommand({ dir, name: 'fresh', force: true })
    expect(result.ok).toBe(true)
    const manifest = parseYaml(await readFile(join(dir, 'app.yaml'), 'utf-8'))
    expect(manifest.name).toBe('fresh')
  })

  it('writes through the given byte store', async () => {
    const dir = await setupDir()
    const store = createMemoryByteStore()
    const result = await initCommand({ dir, name: 'memory' }, store)
    expect(result.ok).toBe(true)
    expect(store.writes).toBe(1)
    expect(store.files.has(join(dir, 'app.yaml'))).toBe(true)
  })

  it('leaves the disk alone when writing through the given byte store', async () => {
    const dir = await setupDir()
    const appDir = join(dir, 'not-created')
    const store = createMemoryByteStore()
    const result = await initCommand({ dir: appDir, name: 'memory' }, store)
    expect(result.ok).toBe(true)
    expect(store.files.has(join(appDir, 'app.yaml'))).toBe(true)
    await expect(access(appDir)).rejects.toThrow()
  })
})
