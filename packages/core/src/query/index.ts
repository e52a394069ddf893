/**
 * @wikibot/core - Read queries and pagination
 */

export * from './paginate.js';
export * from './site.js';
export * from './pages.js';
export * from './revisions.js';
export * from './users.js';
export * from './lists.js';
