import { describe, it, expect } from 'vitest'
import { HttpError, NetworkError, ParseError } from './errors.js'
import { HttpClient, buildUrl } from './http.js'

interface Call {
  url: string
  headers: Record<string, string>
}

function fakeFetch(response: () => Response) {
  const calls: Call[] = []
  const fetchFn: typeof globalThis.fetch = async (input, init) => {
    const headers: Record<string, string> = {}
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value
    })
    calls.push({ url: String(input), headers })
    return response()
  }
  return { calls, fetchFn }
}

describe('buildUrl', () => {
  it('skips undefined params and stringifies the rest', () => {
    expect(buildUrl('https://example.test/api', { a: 'x y', b: undefined, c: 3, d: false })).toBe(
      'https://example.test/api?a=x+y&c=3&d=false',
    )
  })
})

describe('HttpClient', () => {
  it('sends the user agent and lets callers override it', async () => {
    const { calls, fetchFn } = fakeFetch(() => new Response('ok'))
    const http = new HttpClient({ userAgent: 'test-agent', timeoutMs: 1000, fetchFn })

    expect(await http.getText('https://example.test/a')).toBe('ok')
    await http.getText('https://example.test/b', undefined, { 'User-Agent': 'other-agent' })

    expect(calls[0].headers['user-agent']).toBe('test-agent')
    expect(calls[1].headers['user-agent']).toBe('other-agent')
  })

  it('decodes JSON bodies and asks for JSON', async () => {
    const { calls, fetchFn } = fakeFetch(() => new Response('{"n":1}'))
    const http = new HttpClient({ userAgent: 'test-agent', timeoutMs: 1000, fetchFn })

    expect(await http.getJson('https://example.test/data', { q: 'x' })).toEqual({ n: 1 })
    expect(calls[0].url).toBe('https://example.test/data?q=x')
    expect(calls[0].headers.accept).toBe('application/json')
  })

  it('rejects bodies that are not JSON', async () => {
    const { fetchFn } = fakeFetch(() => new Response('<html>'))
    const http = new HttpClient({ userAgent: 'test-agent', timeoutMs: 1000, fetchFn })

    const err = await http.getJson('https://example.test/data').catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ParseError)
    expect(err).toHaveProperty('message', 'Unexpected response from example.test: body is not JSON')
  })

  it('turns non-2xx responses into HttpError with the key redacted', async () => {
    const { fetchFn } = fakeFetch(() => new Response('nope', { status: 404, statusText: 'Not Found' }))
    const http = new HttpClient({ userAgent: 'test-agent', timeoutMs: 1000, fetchFn })

    const err = await http.getText('https://example.test/x', { api_key: 'test-secret', id: 1 }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(HttpError)
    expect(err).toHaveProperty('statusCode', 404)
    expect(err).toHaveProperty('message', 'HTTP 404 Not Found fetching https://example.test/x?api_key=[redacted]&id=1')
  })

  it('turns a timeout into NetworkError naming the redacted URL', async () => {
    const fetchFn: typeof globalThis.fetch = (_input, init) =>
      new Promise((_resolve, reject) => {
        const signal = init?.signal
        signal?.addEventListener('abort', () => reject(signal.reason))
      })
    const http = new HttpClient({ userAgent: 'test-agent', timeoutMs: 20, fetchFn })

    const err = await http.getText('https://example.test/slow', { api_key: 'test-secret' }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(NetworkError)
    expect(err).toHaveProperty('message', 'Timed out after 20ms fetching https://example.test/slow?api_key=[redacted]')
  })

  it('turns a connection failure into NetworkError', async () => {
    const fetchFn: typeof globalThis.fetch = async () => {
      throw new TypeError('fetch failed')
    }
    const http = new HttpClient({ userAgent: 'test-agent', timeoutMs: 1000, fetchFn })

    const err = await http.getJson('https://example.test/x').catch((e: unknown) => e)
    expect(err).toBeInstanceOf(NetworkError)
    expect(err).toHaveProperty('message', 'Request to https://example.test/x failed: fetch failed')
  })
})
