export { RealtimeClient } from './RealtimeClient.js';
export type { ConnectionStats, RealtimeClientEvent, RealtimeClientEventMap } from './RealtimeClient.js';
export { Subscription } from './core/Subscription.js';
export type { SubscriptionState } from './core/Subscription.js';
export type { ConnectionState } from './core/ConnectionStateMachine.js';
export type * from './core/types.js';
export * from './core/errors.js';
export type * from './core/ports/index.js';
export { LOG_LEVELS } from './core/ports/index.js';
export { JsonCodec } from './adapters/codecs/JsonCodec.js';
export { WsTransport } from './adapters/transports/WsTransport.js';
export type { WsTransportOptions } from './adapters/transports/WsTransport.js';
export { ConsoleLogger } from './adapters/services/ConsoleLogger.js';
export { JwtTokenProvider } from './adapters/services/JwtTokenProvider.js';
export type { JwtTokenProviderOptions } from './adapters/services/JwtTokenProvider.js';
export {
  clientSettingsSchema,
  loadClientConfig,
  resolveClientOptions,
} from './infrastructure/config.js';
export type { ClientOptions, ClientSettings, ResolvedClientOptions } from './infrastructure/config.js';
export { StreamPosition } from '@pushline/shared';
