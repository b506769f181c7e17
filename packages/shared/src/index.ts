export * from './types/centrifugo.types.js';
export * from './validation/schemas.js';
export * from './config/codes.js';
export { StreamPosition } from './entities/StreamPosition.js';
