import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { loadConfig, readAlpacaCredentials } from './config.js'

let dir: string

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'broker-alpaca-config-'))
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

describe('loadConfig', () => {
  it('falls back to defaults when files are missing', async () => {
    expect(await loadConfig(dir)).toEqual({
      host: { port: 3000, logLevel: 'info' },
      alpaca: { paper: true, autoInitialize: false },
    })
  })

  it('reads values from the config files', async () => {
    await writeFile(join(dir, 'host.json'), JSON.stringify({ port: 8080, logLevel: 'debug' }))
    await writeFile(join(dir, 'alpaca.json'), JSON.stringify({ paper: false, autoInitialize: true }))

    expect(await loadConfig(dir)).toEqual({
      host: { port: 8080, logLevel: 'debug' },
      alpaca: { paper: false, autoInitialize: true },
    })
  })

  it('fills in defaults for partial files', async () => {
    await writeFile(join(dir, 'host.json'), JSON.stringify({ port: 4000 }))

    const config = await loadConfig(dir)
    expect(config.host).toEqual({ port: 4000, logLevel: 'info' })
  })

  it('rejects invalid values', async () => {
    await writeFile(join(dir, 'host.json'), JSON.stringify({ logLevel: 'verbose' }))
    await expect(loadConfig(dir)).rejects.toThrow()
  })

  it('rejects malformed JSON', async () => {
    await writeFile(join(dir, 'alpaca.json'), '{ paper: ')
    await expect(loadConfig(dir)).rejects.toThrow(SyntaxError)
  })
})

describe('readAlpacaCredentials', () => {
  it('returns both keys when set', () => {
    expect(readAlpacaCredentials({ ALPACA_API_KEY: 'test-key', ALPACA_SECRET_KEY: 'test-secret' })).toEqual({
      apiKey: 'test-key',
      secretKey: 'test-secret',
    })
  })

  it('returns null when either is missing or empty', () => {
    expect(readAlpacaCredentials({ ALPACA_API_KEY: 'test-key' })).toBeNull()
    expect(readAlpacaCredentials({ ALPACA_API_KEY: '', ALPACA_SECRET_KEY: 'test-secret' })).toBeNull()
    expect(readAlpacaCredentials({})).toBeNull()
  })
})
