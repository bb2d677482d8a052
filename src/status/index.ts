export { StatusServer } from './StatusServer.js';
export type { StatusServerConfig } from './StatusServer.js';
