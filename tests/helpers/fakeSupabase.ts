import { createClient } from '@supabase/supabase-js'
import { vi } from 'vitest'
import { SupabaseStore } from '@/lib/supabaseStore'

export type SentRequest = {
  method: string
  url: URL
  headers: Headers
  body: unknown
}

export type Reply = {
  status?: number
  body?: unknown
  headers?: Record<string, string>
}

/**
 * A SupabaseStore whose clients send every request to `respond` instead of a
 * server. The real supabase-js client builds the requests, so the filters and
 * error bodies seen here are the ones PostgREST and GoTrue would exchange.
 */
export function fakeSupabaseStore(respond: (request: SentRequest) => Reply) {
  const sent: SentRequest[] = []

  const fetch = vi.fn(async (...[input, init]: Parameters<typeof globalThis.fetch>): Promise<Response> => {
    const raw = init?.body
    const request: SentRequest = {
      method: init?.method ?? 'GET',
      url: new URL(input instanceof Request ? input.url : input.toString()),
      headers: new Headers(init?.headers),
      body: typeof raw === 'string' && raw !== '' ? JSON.parse(raw) : undefined
    }
    sent.push(request)
    const reply = respond(request)
    return new Response(reply.body === undefined ? null : JSON.stringify(reply.body), {
      status: reply.status ?? 200,
      headers: { 'content-type': 'application/json', ...reply.headers }
    })
  })

  const client = () =>
    createClient('http://localhost:54321', 'test-secret', {
      auth: { persistSession: false, autoRefreshToken: false },
      global: { fetch }
    })

  return { store: new SupabaseStore(client(), client), sent, fetch }
}

/** PostgREST error body. */
export function pgError(status: number, code: string, message: string, details: string | null = null): Reply {
  return { status, body: { code, message, details, hint: null } }
}

/** GoTrue error body. */
export function authError(status: number, errorCode: string, msg: string): Reply {
  return { status, body: { error_code: errorCode, msg, code: status } }
}
