/**
 * @fileoverview Tests for build request resolution and layout helpers
 */

import { describe, it, expect } from '@jest/globals';
import {
  cleanVersion,
  DEFAULT_CONFIG,
  expandTargets,
  getCheckoutDir,
  getDefaultJobs,
  getOutputDir,
  resolveBuildRequest,
  TARGETS
} from '../config';
import { BuildErrorCode, FailureKind } from '../errors';
import { TargetId } from '../types';

describe('resolveBuildRequest', () => {
  it('fills defaults from the host core count', () => {
    const result = resolveBuildRequest({}, {}, 8);

    expect(result).toEqual({
      ok: true,
      value: {
        target: TargetId.NodeDaemon,
        jobs: 7,
        buildDir: DEFAULT_CONFIG.BUILD_DIR,
        aggressiveOptimizations: false,
        versions: {},
        allowUnverifiedSource: false,
        continueOnFailure: false
      }
    });
  });

  it('reads jobs and build directory from the environment', () => {
    const result = resolveBuildRequest({}, { BINFORGE_JOBS: '3', BINFORGE_BUILD_DIR: '/tmp/builds' }, 8);

    expect(result.ok && result.value.jobs).toBe(3);
    expect(result.ok && result.value.buildDir).toBe('/tmp/builds');
  });

  it('prefers explicit input over the environment', () => {
    const result = resolveBuildRequest({ jobs: 2, buildDir: '/srv/builds' }, { BINFORGE_JOBS: '3' }, 8);

    expect(result.ok && result.value.jobs).toBe(2);
    expect(result.ok && result.value.buildDir).toBe('/srv/builds');
  });

  it('keeps independently selected versions', () => {
    const result = resolveBuildRequest(
      { target: 'both', versions: { nodeDaemon: 'v28.1', indexer: 'v0.10.6' } },
      {},
      4
    );

    expect(result.ok && result.value.target).toBe('both');
    expect(result.ok && result.value.versions).toEqual({ nodeDaemon: 'v28.1', indexer: 'v0.10.6' });
  });

  it('rejects more jobs than host cores', () => {
    const result = resolveBuildRequest({ jobs: 9 }, {}, 8);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe(FailureKind.InvalidRequest);
      expect(result.failure.code).toBe(BuildErrorCode.InvalidJobCount);
      expect(result.failure.details).toBe('jobs: Job count must not exceed 8 host cores');
    }
  });

  it('rejects a zero job count', () => {
    const result = resolveBuildRequest({ jobs: 0 }, {}, 8);

    expect(!result.ok && result.failure.details).toBe('jobs: Job count must be at least 1');
  });

  it('rejects a fractional job count', () => {
    const result = resolveBuildRequest({ jobs: 2.5 }, {}, 8);

    expect(!result.ok && result.failure.details).toBe('jobs: Job count must be an integer');
  });

  it('rejects a non-numeric job count from the environment', () => {
    const result = resolveBuildRequest({}, { BINFORGE_JOBS: 'many' }, 8);

    expect(result.ok).toBe(false);
    expect(!result.ok && result.failure.details.startsWith('jobs: ')).toBe(true);
  });

  it('rejects an unknown target', () => {
    const result = resolveBuildRequest({ target: 'wallet' }, {}, 8);

    expect(result.ok).toBe(false);
    expect(!result.ok && result.failure.details).toContain('Target must be node-daemon, indexer, or both');
  });

  it('rejects a version that would leave the build directory', () => {
    const result = resolveBuildRequest({ versions: { nodeDaemon: '../../../tmp/escape' } }, {}, 8);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.code).toBe(BuildErrorCode.InvalidConfig);
      expect(result.failure.details).toBe('versions.nodeDaemon: Version must be a release tag such as v25.0');
    }
  });

  it('rejects a version that git would read as an option', () => {
    const result = resolveBuildRequest({ versions: { indexer: '--upload-pack=touch' } }, {}, 8);

    expect(!result.ok && result.failure.details).toBe('versions.indexer: Version must be a release tag such as v25.0');
  });

  it('reports job count and other violations together as a configuration error', () => {
    const result = resolveBuildRequest({ jobs: 0, target: 'wallet' }, {}, 8);

    expect(!result.ok && result.failure.code).toBe(BuildErrorCode.InvalidConfig);
  });
});

describe('layout helpers', () => {
  it('strips the leading v from directory names', () => {
    expect(cleanVersion('v25.0')).toBe('25.0');
    expect(cleanVersion('0.10.6')).toBe('0.10.6');
  });

  it('derives checkout and output directories', () => {
    expect(getCheckoutDir('/builds', TARGETS[TargetId.NodeDaemon], 'v25.0')).toBe('/builds/bitcoin-25.0');
    expect(getOutputDir('/builds', TARGETS[TargetId.NodeDaemon], 'v25.0')).toBe('/builds/binaries/bitcoin-25.0');
    expect(getCheckoutDir('/builds', TARGETS[TargetId.Indexer], 'v0.10.6')).toBe('/builds/electrs-0.10.6');
  });

  it('leaves one core free but never drops below one job', () => {
    expect(getDefaultJobs(8)).toBe(7);
    expect(getDefaultJobs(1)).toBe(1);
  });

  it('expands both into node daemon then indexer', () => {
    expect(expandTargets('both')).toEqual([TargetId.NodeDaemon, TargetId.Indexer]);
    expect(expandTargets(TargetId.Indexer)).toEqual([TargetId.Indexer]);
  });
});
