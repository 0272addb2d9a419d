import { z } from 'zod'
import { readFile } from 'fs/promises'
import { resolve } from 'path'
import { LOG_LEVELS } from './logger.js'

const CONFIG_DIR = resolve('data/config')

// ==================== Individual Schemas ====================

const hostSchema = z.object({
  port: z.number().int().positive().default(3000),
  logLevel: z.enum(LOG_LEVELS).default('info'),
})

const alpacaSchema = z.object({
  paper: z.boolean().default(true),
  /** Call initialize at startup with ALPACA_API_KEY / ALPACA_SECRET_KEY from the environment. */
  autoInitialize: z.boolean().default(false),
})

// ==================== Unified Config Type ====================

export type Config = {
  host: z.infer<typeof hostSchema>
  alpaca: z.infer<typeof alpacaSchema>
}

// ==================== Loader ====================

async function loadJsonFile(dir: string, filename: string): Promise<unknown> {
  try {
    const raw = await readFile(resolve(dir, filename), 'utf-8')
    return JSON.parse(raw)
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return {} // File not found → use defaults from Zod schema
    }
    throw err
  }
}

export async function loadConfig(dir: string = CONFIG_DIR): Promise<Config> {
  const [hostRaw, alpacaRaw] = await Promise.all([
    loadJsonFile(dir, 'host.json'),
    loadJsonFile(dir, 'alpaca.json'),
  ])

  return {
    host: hostSchema.parse(hostRaw),
    alpaca: alpacaSchema.parse(alpacaRaw),
  }
}

// ==================== Credentials ====================

export interface AlpacaCredentials {
  apiKey: string
  secretKey: string
}

/** Read Alpaca credentials from the environment; null when either is unset. */
export function readAlpacaCredentials(env: NodeJS.ProcessEnv = process.env): AlpacaCredentials | null {
  const apiKey = env.ALPACA_API_KEY
  const secretKey = env.ALPACA_SECRET_KEY
  if (!apiKey || !secretKey) return null
  return { apiKey, secretKey }
}
