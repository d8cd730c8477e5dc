/**
 * @fileoverview Error handling for the build engine
 */

export * from './codes';
export * from './build-error';
export * from './result';
