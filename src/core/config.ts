import { z } from 'zod'
import { readFile } from 'fs/promises'
import { resolve } from 'path'
import { ConfigError } from './errors.js'

const DEFAULT_CONFIG_DIR = 'data/config'

// ==================== Individual Schemas ====================

const httpSchema = z.object({
  userAgent: z.string().min(1).default('Mozilla/5.0 (compatible; market-data-scraper/0.1)'),
  timeoutMs: z.number().int().positive().default(15_000),
})

const fredSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().default('https://api.stlouisfed.org'),
  searchLimit: z.number().int().positive().max(1000).default(20),
})

const secSchema = z.object({
  // EDGAR rejects requests without a contact address in the user agent
  userAgent: z.string().min(1).default('market-data-scraper contact@example.com'),
  baseUrl: z.string().url().default('https://www.sec.gov'),
})

const newsSchema = z.object({
  feedUrl: z.string().url().default('https://feeds.finance.yahoo.com/rss/2.0/headline'),
  region: z.string().default('US'),
  lang: z.string().default('en-US'),
})

const marketDataSchema = z.object({
  provider: z.discriminatedUnion('type', [
    z.object({
      type: z.literal('yahoo'),
    }),
  ]).default({ type: 'yahoo' }),
})

const serverSchema = z.object({
  port: z.number().int().positive().default(3000),
})

const loggingSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn'),
})

// ==================== Unified Config Type ====================

export type Config = {
  http: z.infer<typeof httpSchema>
  fred: z.infer<typeof fredSchema>
  sec: z.infer<typeof secSchema>
  news: z.infer<typeof newsSchema>
  marketData: z.infer<typeof marketDataSchema>
  server: z.infer<typeof serverSchema>
  logging: z.infer<typeof loggingSchema>
}

export type LogLevel = Config['logging']['level']

export interface LoadConfigOptions {
  configDir?: string
  env?: Record<string, string | undefined>
}

// ==================== Loader ====================

const jsonObjectSchema = z.record(z.string(), z.unknown())

async function loadJsonFile(dir: string, filename: string): Promise<Record<string, unknown>> {
  const path = resolve(dir, filename)
  let raw: string
  try {
    raw = await readFile(path, 'utf-8')
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return {} // File not found → use defaults from Zod schema
    }
    throw err
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new ConfigError(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }
  const object = jsonObjectSchema.safeParse(parsed)
  if (!object.success) {
    throw new ConfigError(`${path} must contain a JSON object`)
  }
  return object.data
}

function parseSection<T extends z.ZodTypeAny>(name: string, schema: T, raw: unknown): z.infer<T> {
  const result = schema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${[name, ...issue.path].join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${issues}`)
  }
  return result.data
}

/** Drop empty env values so they never shadow file settings. */
function envValue(env: Record<string, string | undefined>, key: string): string | undefined {
  const value = env[key]?.trim()
  return value ? value : undefined
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const dir = options.configDir ?? DEFAULT_CONFIG_DIR
  const env = options.env ?? process.env

  const [httpRaw, fredRaw, secRaw, newsRaw, marketDataRaw, serverRaw, loggingRaw] = await Promise.all([
    loadJsonFile(dir, 'http.json'),
    loadJsonFile(dir, 'fred.json'),
    loadJsonFile(dir, 'sec.json'),
    loadJsonFile(dir, 'news.json'),
    loadJsonFile(dir, 'market-data.json'),
    loadJsonFile(dir, 'server.json'),
    loadJsonFile(dir, 'logging.json'),
  ])

  const fredApiKey = envValue(env, 'FRED_API_KEY')
  const secUserAgent = envValue(env, 'SEC_USER_AGENT')
  const logLevel = envValue(env, 'LOG_LEVEL')?.toLowerCase()
  const port = envValue(env, 'PORT')

  return {
    http: parseSection('http', httpSchema, httpRaw),
    fred: parseSection('fred', fredSchema, fredApiKey ? { ...fredRaw, apiKey: fredApiKey } : fredRaw),
    sec: parseSection('sec', secSchema, secUserAgent ? { ...secRaw, userAgent: secUserAgent } : secRaw),
    news: parseSection('news', newsSchema, newsRaw),
    marketData: parseSection('marketData', marketDataSchema, marketDataRaw),
    server: parseSection('server', serverSchema, port ? { ...serverRaw, port: Number(port) } : serverRaw),
    logging: parseSection('logging', loggingSchema, logLevel ? { ...loggingRaw, level: logLevel } : loggingRaw),
  }
}
