export * from './types.js';
export { DocumentLoader, detectFormat, htmlToText } from './loader.js';
