import { HttpError, NetworkError, ParseError } from './errors.js'
import { redactUrl, silentLogger, type Logger } from './logger.js'

export type QueryParams = Record<string, string | number | boolean | undefined>

export interface HttpClientOptions {
  userAgent: string
  timeoutMs: number
  logger?: Logger
  /** Injectable for testing */
  fetchFn?: typeof globalThis.fetch
}

export function buildUrl(base: string, params?: QueryParams): string {
  const url = new URL(base)
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      if (value === undefined) continue
      url.searchParams.set(key, String(value))
    }
  }
  return url.toString()
}

export class HttpClient {
  private userAgent: string
  private timeoutMs: number
  private logger: Logger
  private fetchFn: typeof globalThis.fetch

  constructor(options: HttpClientOptions) {
    this.userAgent = options.userAgent
    this.timeoutMs = options.timeoutMs
    this.logger = options.logger ?? silentLogger
    this.fetchFn = options.fetchFn ?? globalThis.fetch
  }

  async getText(base: string, params?: QueryParams, headers?: Record<string, string>): Promise<string> {
    return this.request(buildUrl(base, params), headers)
  }

  async getJson(base: string, params?: QueryParams, headers?: Record<string, string>): Promise<unknown> {
    const url = buildUrl(base, params)
    const text = await this.request(url, { Accept: 'application/json', ...headers })
    try {
      return JSON.parse(text)
    } catch (err) {
      throw new ParseError(new URL(url).host, 'body is not JSON', { cause: err })
    }
  }

  /** GET and read the body. The timeout covers both. */
  private async request(url: string, headers?: Record<string, string>): Promise<string> {
    const safeUrl = redactUrl(url)
    this.logger.debug({ url: safeUrl }, 'GET')

    let res: Response
    let body: string
    try {
      res = await this.fetchFn(url, {
        method: 'GET',
        headers: { 'User-Agent': this.userAgent, ...headers },
        signal: AbortSignal.timeout(this.timeoutMs),
      })
      body = await res.text()
    } catch (err) {
      this.logger.error({ err, url: safeUrl }, 'request failed')
      const message = isTimeout(err)
        ? `Timed out after ${this.timeoutMs}ms fetching ${safeUrl}`
        : `Request to ${safeUrl} failed: ${err instanceof Error ? err.message : String(err)}`
      throw new NetworkError(safeUrl, message, { cause: err })
    }

    if (!res.ok) {
      this.logger.error({ url: safeUrl, status: res.status }, 'request failed')
      throw new HttpError(safeUrl, res.status, res.statusText)
    }
    return body
  }
}

function isTimeout(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError'
}
