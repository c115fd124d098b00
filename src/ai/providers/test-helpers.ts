// Shared by the provider tests: a stand-in for global fetch.
import { mock } from 'node:test'
import { loadConfig, type ProvidersConfig } from '../../env.js'

export interface RecordedRequest {
  url: string
  method: string | undefined
  headers: Record<string, string>
  body: RequestInit['body']
}

export function stubFetch(respond: (signal: AbortSignal | undefined) => Response | Promise<Response>): RecordedRequest[] {
  const calls: RecordedRequest[] = []
  mock.method(globalThis, 'fetch', async (input: string | URL | Request, init?: RequestInit) => {
    const headers: Record<string, string> = {}
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value
    })
    calls.push({ url: String(input), method: init?.method, headers, body: init?.body })
    return respond(init?.signal ?? undefined)
  })
  return calls
}

export function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status, headers: { 'content-type': 'application/json' } })
}

/** Parsed JSON body of a recorded request. */
export function sentJson(req: RecordedRequest | undefined): unknown {
  const body = req?.body
  if (typeof body !== 'string') throw new Error('expected a JSON body')
  return JSON.parse(body)
}

export function testProviders(env: Record<string, string> = {}): ProvidersConfig {
  return loadConfig({
    OPENAI_API_KEY: 'test-key',
    ANTHROPIC_API_KEY: 'test-key',
    GOOGLE_API_KEY: 'test-key',
    RESPONSE_LANGUAGE: 'en-US',
    ...env,
  }).providers
}

export function restoreFetch(): void {
  mock.restoreAll()
}
