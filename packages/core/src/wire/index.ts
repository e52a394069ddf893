/**
 * @wikibot/core - Wire codec
 *
 * Request parameter encoding and decoding of XML API responses.
 */

export * from './fragments.js';
export * from './params.js';
export * from './decode.js';
