/**
 * @wikibot/core - Mutation pipeline
 */

export * from './permissions.js';
export * from './classify.js';
export * from './pipeline.js';
export * from './actions.js';
