/**
 * Runtime abstraction layer.
 *
 * Thin wrappers around the Node.js process, filesystem and terminal APIs so
 * the rest of the code never reaches for `process` or `node:fs` directly.
 */

export * from './process.ts';
export * from './fs.ts';
export * from './terminal.ts';
