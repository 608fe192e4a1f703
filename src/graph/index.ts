/**
 * Graph and builder exports.
 */

export * from './flow-graph';
export * from './builder';
