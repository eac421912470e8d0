export { Context, type ContextInit } from './context.js';
