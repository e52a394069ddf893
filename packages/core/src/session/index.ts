/**
 * @wikibot/core - Session module
 */

export * from './session.js';
export * from './identity.js';
export * from './governor.js';
export * from './manager.js';
export * from './snapshot.js';
