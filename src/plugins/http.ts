import { Hono } from 'hono'
import { serve } from '@hono/node-server'
import type { Plugin, HostContext } from '../core/types.js'
import type { BrokerPlugin } from '../extension/broker-alpaca/index.js'
import { PluginContractError, isEntryPointName } from '../extension/broker-alpaca/index.js'

const decoder = new TextDecoder()

/**
 * Routes that drive the broker plugin over HTTP: the request body is handed
 * to the entry point as-is and its bytes come back as the response body.
 */
export function createHostApp(broker: BrokerPlugin): Hono {
  const app = new Hono()

  app.get('/health', (c) => c.json({ ok: true }))

  app.post('/plugin/:entry', async (c) => {
    const entry = c.req.param('entry')
    if (!isEntryPointName(entry)) {
      return c.json({ error: `Unknown entry point: ${entry}` }, 404)
    }

    const request = new Uint8Array(await c.req.arrayBuffer())
    try {
      const response = await broker[entry](request)
      return c.body(decoder.decode(response), 200, { 'Content-Type': 'application/json' })
    } catch (err) {
      if (err instanceof PluginContractError) {
        return c.json({ error: err.message }, 400)
      }
      throw err
    }
  })

  return app
}

export class HttpPlugin implements Plugin {
  name = 'http'
  private server: ReturnType<typeof serve> | null = null

  async start(ctx: HostContext) {
    const app = createHostApp(ctx.broker)

    this.server = serve({ fetch: app.fetch, port: ctx.config.host.port }, (info) => {
      ctx.logger.info({ port: info.port }, `http plugin listening on http://localhost:${info.port}`)
    })
  }

  async stop() {
    this.server?.close()
  }
}
