export type { ILogger, LogLevel, LogContext } from './ILogger.js';
export { LOG_LEVELS } from './ILogger.js';
export type { ITokenProvider } from './ITokenProvider.js';
export type {
  TransportFrame,
  FrameSink,
  TransportSession,
  TransportOpenOptions,
  TransportFactory,
} from './ITransport.js';
export type { ICodec, DecodedFrame } from './ICodec.js';
