export { TelegramTransport, toIncomingMessage, telegramStatusCode } from './TelegramTransport.js';
export type { TelegramTransportConfig } from './TelegramTransport.js';
export { EventStream } from './EventStream.js';
export type { Transport, TransportEventTypes } from './types.js';
