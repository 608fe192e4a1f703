/**
 * Wire format, layout, compiler and decompiler exports.
 */

export * from './wire';
export * from './layout';
export * from './validator';
export * from './compiler';
export * from './decompiler';
export * from './definition';
export * from './codegen';
