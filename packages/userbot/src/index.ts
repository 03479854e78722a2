export { UserbotClient, clientParams } from './client.js';
export type { UserbotClientOptions } from './client.js';
export { classifyMtprotoError } from './errors.js';
export { describeMedia, isRelayInbound, toInboxMessage, peerToChatId } from './media.js';
