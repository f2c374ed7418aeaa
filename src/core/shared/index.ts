/**
 * Shared module exports.
 *
 * Cross-cutting helpers used by multiple core modules.
 */

export { resolveUnderRoot, isRegularFile } from './files.js';

export { isMapping } from './records.js';
