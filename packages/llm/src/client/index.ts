export { Client, type ClientConfig } from './client.js';
export { executeMiddlewareChain } from './middleware.js';
