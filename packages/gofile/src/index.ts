export { GofileClient } from './client.js';
export type { GofileClientOptions } from './client.js';
