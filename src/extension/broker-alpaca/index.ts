// Plugin entry points
export { createBrokerPlugin, createErrorAccount, createErrorOrder, PluginContractError } from './entry-points.js'
export type { BrokerPlugin, BrokerPluginOptions, EntryPoint } from './entry-points.js'
export { BrokerContext } from './context.js'

// Boundary protocol
export { ENTRY_POINTS, isEntryPointName } from './protocol.js'
export type {
  EntryPointName,
  InitializeRequest,
  InitializeResponse,
  GetAccountsResponse,
  GetPositionsResponse,
  SubmitOrderRequest,
  SubmitOrderResponse,
  CancelOrderRequest,
  CancelOrderResponse,
} from './protocol.js'

// Host models
export type {
  AccountBalance,
  AccountSummary,
  Position,
  Order,
  OrderRequest,
  OrderSide,
  OrderType,
  OrderStatus,
  Extensions,
  ExtensionValue,
} from './models.js'

// Transport
export { execute, isSuccess, parseJsonBody } from './http.js'
export type { HostHttp, HttpRequest, HttpResponse, HttpMethod } from './http.js'
export { createFetchCapability } from './fetch-capability.js'
export type { FetchCapabilityOptions } from './fetch-capability.js'

// Alpaca provider
export { AlpacaClient, AlpacaApiError, LIVE_API_URL, PAPER_API_URL } from './providers/alpaca/AlpacaClient.js'
export type { AlpacaClientConfig } from './providers/alpaca/AlpacaClient.js'
