import { loadConfig, type Config } from './config.js'
import { createAppContext } from './context.js'
import { silentLogger } from './logger.js'
import type { AppContext } from './types.js'
import type { IMarketDataProvider } from '../extension/market-data/index.js'

export interface TestContextOptions {
  provider: IMarketDataProvider
  /** Body served for every HTTP request, as JSON unless it is already a string */
  body?: unknown
  status?: number
  /** Replaces the canned fetch entirely */
  fetchFn?: typeof globalThis.fetch
  env?: Record<string, string>
}

export interface TestContext {
  context: AppContext
  config: Config
  requests: URL[]
}

/** AppContext over an in-memory provider and a canned fetch; nothing leaves the process. */
export async function createTestContext(options: TestContextOptions): Promise<TestContext> {
  const config = await loadConfig({ configDir: 'does-not-exist', env: options.env ?? {} })
  const requests: URL[] = []
  const cannedFetch: typeof globalThis.fetch = async (input) => {
    requests.push(new URL(String(input)))
    const body = typeof options.body === 'string' ? options.body : JSON.stringify(options.body ?? {})
    return new Response(body, { status: options.status ?? 200 })
  }
  const context = createAppContext(config, silentLogger, {
    provider: options.provider,
    fetchFn: options.fetchFn ?? cannedFetch,
  })
  return { context, config, requests }
}
