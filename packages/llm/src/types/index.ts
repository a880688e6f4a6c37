export * from './content.js';
export * from './message.js';
export * from './tool.js';
export * from './request.js';
export * from './response.js';
export * from './config.js';
export * from './provider.js';
export * from './middleware.js';
export * from './error.js';
