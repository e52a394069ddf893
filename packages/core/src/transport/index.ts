export * from './cookies.js';
export * from './http.js';
