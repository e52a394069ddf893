/**
 * @wikibot/core - API module
 *
 * The client facade, its error types and the shared data types.
 */

export * from './client.js';
export * from './errors.js';
export * from './types.js';
export type { ApiContext } from './context.js';
export { ApiCaller, type ReadOptions } from './caller.js';
