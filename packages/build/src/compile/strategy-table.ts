/**
 * @fileoverview Build-system selection by target and version
 */

import { CMAKE_MIN_MAJOR } from '../config';
import { TargetId } from '../types';
import { getMajorVersion } from '../version';
import { AutotoolsStrategy } from './autotools';
import { CargoReleaseStrategy } from './cargo';
import { CMakeStrategy } from './cmake';
import type { BuildStrategy } from './strategy';

export interface StrategyRule {
  target: TargetId;
  /** Whether this rule applies to a release tag */
  matches: (version: string) => boolean;
  create: () => BuildStrategy;
}

/**
 * Rules are tried in order; the first match wins
 */
export const STRATEGY_TABLE: readonly StrategyRule[] = [
  {
    target: TargetId.NodeDaemon,
    matches: (version) => getMajorVersion(version) >= CMAKE_MIN_MAJOR,
    create: () => new CMakeStrategy()
  },
  {
    target: TargetId.NodeDaemon,
    matches: () => true,
    create: () => new AutotoolsStrategy()
  },
  {
    target: TargetId.Indexer,
    matches: () => true,
    create: () => new CargoReleaseStrategy()
  }
];

export function selectStrategy(
  target: TargetId,
  version: string,
  table: readonly StrategyRule[] = STRATEGY_TABLE
): BuildStrategy | undefined {
  return table.find(rule => rule.target === target && rule.matches(version))?.create();
}
