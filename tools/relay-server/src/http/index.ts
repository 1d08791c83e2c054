export { createApp } from './app.js';
export type { AppDependencies } from './app.js';
export { errorHandler, notFoundHandler, statusFor } from './error-handler.js';
