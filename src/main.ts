import { loadConfig, readAlpacaCredentials } from './core/config.js'
import { createLogger } from './core/logger.js'
import type { Plugin, HostContext } from './core/types.js'
import { HttpPlugin } from './plugins/http.js'
import { createBrokerPlugin, createFetchCapability } from './extension/broker-alpaca/index.js'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

async function main() {
  const config = await loadConfig()
  const logger = createLogger('broker-alpaca', config.host.logLevel)

  // ==================== Broker plugin ====================

  const broker = createBrokerPlugin({
    host: createFetchCapability(),
    logger,
  })

  if (config.alpaca.autoInitialize) {
    const credentials = readAlpacaCredentials()
    if (!credentials) {
      logger.warn('alpaca.autoInitialize is set but ALPACA_API_KEY / ALPACA_SECRET_KEY are not; waiting for initialize')
    } else {
      const reply = await broker.initialize(encoder.encode(JSON.stringify({
        api_key: credentials.apiKey,
        api_secret: credentials.secretKey,
        is_paper: config.alpaca.paper,
      })))
      logger.info(`auto-initialize: ${decoder.decode(reply)}`)
    }
  }

  // ==================== Plugins ====================

  const ctx: HostContext = { config, broker, logger }
  const plugins: Plugin[] = [new HttpPlugin()]

  for (const plugin of plugins) {
    await plugin.start(ctx)
    logger.info(`plugin started: ${plugin.name}`)
  }

  // ==================== Shutdown ====================

  const shutdown = () => {
    Promise.all(plugins.map((plugin) => plugin.stop())).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'shutdown failed')
        process.exit(1)
      },
    )
  }
  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
}

main().catch((err) => {
  console.error('fatal:', err)
  process.exit(1)
})
