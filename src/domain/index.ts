/**
 * Domain model exports.
 */

export * from './errors';
export * from './flow';
