import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { TextDecoder } from 'node:util'
import { parse as parseYaml } from 'yaml'
import { libAddCommand, libListCommand, libRemoveCommand } from '../src/commands/lib.js'
import { createMemoryByteStore, type MemoryByteStore } from './fakes.js'

const dir = '/projects/web'

const APP_YAML = `apiVersion: 0.1.0
name: web
registries:
  incubator:
    protocol: github
    uri: github.com/example/incubator
`

describe('appspec lib', () => {
  let store: MemoryByteStore

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    store = createMemoryByteStore({ [`${dir}/app.yaml`]: APP_YAML })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  function manifest() {
    return parseYaml(new TextDecoder().decode(store.files.get(`${dir}/app.yaml`)?.data))
  }

  it('adds a library from a known registry', async () => {
    const result = await libAddCommand('redis', { dir, registry: 'incubator' }, store)
    expect(result.ok).toBe(true)
    expect(manifest().libraries).toEqual({ redis: { registry: 'incubator' } })
  })

  it('pins a ref and commit', async () => {
    await libAddCommand('nginx', { dir, registry: 'incubator', ref: 'master', commit: 'abc123' }, store)
    expect(manifest().libraries.nginx).toEqual({
      registry: 'incubator',
      gitVersion: { refSpec: 'master', commitSha: 'abc123' },
    })
  })

  it('rejects an unknown registry', async () => {
    const result = await libAddCommand('redis', { dir, registry: 'stable' }, store)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('No registry named "stable"')
    expect(store.writes).toBe(0)
  })

  it('rejects a duplicate library', async () => {
    await libAddCommand('redis', { dir, registry: 'incubator' }, store)
    const result = await libAddCommand('redis', { dir, registry: 'incubator' }, store)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('LIBRARY_EXISTS')
  })

  it('removes a library', async () => {
    await libAddCommand('redis', { dir, registry: 'incubator' }, store)
    expect((await libRemoveCommand('redis', { dir }, store)).ok).toBe(true)
    expect(manifest().libraries).toBeUndefined()

    const again = await libRemoveCommand('redis', { dir }, store)
    expect(again.ok).toBe(false)
  })

  it('lists libraries', async () => {
    await libAddCommand('nginx', { dir, registry: 'incubator', commit: 'abc123' }, store)
    const result = await libListCommand({ dir }, store)
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.nginx).toEqual({
      name: 'nginx',
      registry: 'incubator',
      gitVersion: { refSpec: '', commitSha: 'abc123' },
    })
    expect(console.error).toHaveBeenCalledWith('  nginx (incubator)@abc123')
  })
})
