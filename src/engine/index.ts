/**
 * Engine — Barrel Export
 */
export { createInterceptionEngine } from './createInterceptionEngine.js';
export type { InterceptionEngine, InterceptionEngineOptions } from './createInterceptionEngine.js';
