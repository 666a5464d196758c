export * from './types.js';
export { GoogleProvider } from './google.js';
