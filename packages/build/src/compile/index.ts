/**
 * @fileoverview Build strategies
 */

export * from './strategy';
export * from './autotools';
export * from './cmake';
export * from './cargo';
export * from './strategy-table';
