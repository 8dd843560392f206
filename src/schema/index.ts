// Schema exports
export * from './message.js';
export * from './rpc.js';
