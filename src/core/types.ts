import type { BrokerPlugin } from '../extension/broker-alpaca/index.js'
import type { Config } from './config.js'
import type { Logger } from './logger.js'

export type { Config }

export interface Plugin {
  name: string
  start(ctx: HostContext): Promise<void>
  stop(): Promise<void>
}

export interface HostContext {
  config: Config
  broker: BrokerPlugin
  logger: Logger
}
