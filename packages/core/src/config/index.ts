/**
 * @wikibot/core - Configuration module
 */

export * from './env.js';
