import { describe, it, expect, vi } from 'vitest'
import { createHostApp } from './http.js'
import type { BrokerPlugin, EntryPoint } from '../extension/broker-alpaca/index.js'
import { PluginContractError } from '../extension/broker-alpaca/index.js'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

function reply(body: unknown): EntryPoint {
  return vi.fn<EntryPoint>(async () => encoder.encode(JSON.stringify(body)))
}

// Stub plugin, no server and no broker
function createTestApp() {
  const broker: BrokerPlugin = {
    initialize: reply({ success: true, message: 'Alpaca plugin initialized (paper)' }),
    get_accounts: reply({ accounts: [] }),
    get_positions: reply({ positions: [] }),
    submit_order: vi.fn<EntryPoint>(async () => {
      throw new PluginContractError('submit_order', 'order: Required')
    }),
    cancel_order: reply({ success: true, order_id: 'ord-1' }),
  }
  return { app: createHostApp(broker), broker }
}

describe('host routes', () => {
  it('GET /health returns ok', async () => {
    const { app } = createTestApp()
    const res = await app.request('/health')
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ ok: true })
  })

  it('POST /plugin/:entry forwards the body bytes and returns the reply', async () => {
    const { app, broker } = createTestApp()
    const res = await app.request('/plugin/cancel_order', { method: 'POST', body: '{"order_id":"ord-1"}' })

    expect(res.status).toBe(200)
    expect(res.headers.get('content-type')).toBe('application/json')
    expect(await res.json()).toEqual({ success: true, order_id: 'ord-1' })

    const forwarded = vi.mocked(broker.cancel_order).mock.calls[0][0]
    expect(decoder.decode(forwarded)).toBe('{"order_id":"ord-1"}')
  })

  it('accepts an empty body', async () => {
    const { app } = createTestApp()
    const res = await app.request('/plugin/get_positions', { method: 'POST' })
    expect(await res.json()).toEqual({ positions: [] })
  })

  it('returns 404 for an unknown entry point', async () => {
    const { app } = createTestApp()
    const res = await app.request('/plugin/alloc', { method: 'POST', body: '{}' })
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'Unknown entry point: alloc' })
  })

  it('returns 400 for a malformed request', async () => {
    const { app } = createTestApp()
    const res = await app.request('/plugin/submit_order', { method: 'POST', body: '{}' })
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'Malformed submit_order request: order: Required' })
  })
})
