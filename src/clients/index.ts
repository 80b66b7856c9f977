/**
 * Clients Exports
 *
 * Third-party API clients
 */

export * from './bilibili/index.js';
