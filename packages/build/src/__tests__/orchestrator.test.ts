/**
 * @fileoverview Tests for build orchestration
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { CargoReleaseStrategy, STRATEGY_TABLE, type StrategyRule } from '../compile';
import { EnvironmentComposer } from '../environment';
import { BuildError, BuildErrorCode, FailureKind } from '../errors';
import { BuildOrchestrator, createStaticGate, type ConfirmationGate, type VersionSource } from '../orchestrator';
import {
  Architecture,
  BuildPhase,
  BuildSystem,
  TargetId,
  type BuildRequest,
  type TargetOutcome
} from '../types';
import type { CommandSpec } from '../utils/process';
import { exitedWith, FakeCommandRunner } from './fake-runner';

const NODE_BINARIES = ['bitcoind', 'bitcoin-cli', 'bitcoin-tx', 'bitcoin-wallet', 'bitcoin-util'];

function writeBinaries(dir: string, names: string[]): void {
  mkdirSync(dir, { recursive: true });
  for (const name of names) {
    writeFileSync(join(dir, name), `binary ${name}`);
  }
}

/** Runner that behaves like a successful checkout and build */
function upstreamRunner(commits: { head: string; tagged: string } = { head: 'c0ffee', tagged: 'c0ffee' }): FakeCommandRunner {
  return new FakeCommandRunner()
    .on('git rev-parse HEAD', (_spec, emit) => {
      emit(commits.head);
      return undefined;
    })
    .on('git rev-list -n 1', (_spec, emit) => {
      emit(commits.tagged);
      return undefined;
    })
    .on('cmake --build', (spec, emit) => {
      emit('[100%] Built target bitcoind');
      writeBinaries(join(spec.cwd, 'build', 'bin'), NODE_BINARIES);
      return undefined;
    })
    .on('make', spec => {
      writeBinaries(join(spec.cwd, 'bin'), NODE_BINARIES.slice(0, 4));
      return undefined;
    })
    .on('cargo build', spec => {
      writeBinaries(join(spec.cwd, 'target', 'release'), ['electrs']);
      return undefined;
    });
}

function catalogOf(...versions: string[]): VersionSource {
  return { listVersions: async () => versions };
}

function trackingGate(answers: { aggressive?: boolean; integrity?: boolean } = {}) {
  return {
    confirmAggressiveOptimizations: jest.fn<ConfirmationGate['confirmAggressiveOptimizations']>(
      async () => answers.aggressive ?? false
    ),
    confirmIntegrityOverride: jest.fn<ConfirmationGate['confirmIntegrityOverride']>(
      async () => answers.integrity ?? false
    )
  };
}

/** Indexer builds with a toolchain check that always passes or always fails */
function strategiesWithCargo(toolchainPresent: boolean): StrategyRule[] {
  return [
    ...STRATEGY_TABLE.filter(rule => rule.target === TargetId.NodeDaemon),
    {
      target: TargetId.Indexer,
      matches: () => true,
      create: () => new CargoReleaseStrategy(() => toolchainPresent)
    }
  ];
}

function findCall(runner: FakeCommandRunner, prefix: string): CommandSpec | undefined {
  return runner.calls.find(call => [call.command, ...call.args].join(' ').startsWith(prefix));
}

describe('BuildOrchestrator', () => {
  let buildDir: string;

  const composer = new EnvironmentComposer({
    baseEnv: { PATH: '/usr/bin:/bin' },
    homeDir: '/home/test',
    probe: { isDirectory: () => false, isFile: () => false }
  });

  function request(overrides: Partial<BuildRequest> = {}): BuildRequest {
    return {
      target: TargetId.NodeDaemon,
      jobs: 2,
      buildDir,
      aggressiveOptimizations: false,
      versions: { nodeDaemon: 'v25.0' },
      allowUnverifiedSource: false,
      continueOnFailure: false,
      ...overrides
    };
  }

  function orchestrator(
    runner: FakeCommandRunner,
    gate: ConfirmationGate = createStaticGate(false),
    extra: { catalogs?: Partial<Record<TargetId, VersionSource>>; strategies?: StrategyRule[] } = {}
  ): BuildOrchestrator {
    return new BuildOrchestrator({
      runner,
      gate,
      composer,
      architecture: Architecture.AppleSilicon,
      catalogs: extra.catalogs ?? { [TargetId.NodeDaemon]: catalogOf(), [TargetId.Indexer]: catalogOf() },
      strategies: extra.strategies
    });
  }

  beforeEach(() => {
    buildDir = mkdtempSync(join(tmpdir(), 'binforge-build-'));
  });

  afterEach(() => {
    rmSync(buildDir, { recursive: true, force: true });
  });

  describe('node daemon v25.0', () => {
    it('clones, verifies, builds with CMake and collects binaries', async () => {
      const runner = upstreamRunner();
      const report = await orchestrator(runner).run(request());
      const checkoutDir = join(buildDir, 'bitcoin-25.0');
      const outputDir = join(buildDir, 'binaries', 'bitcoin-25.0');

      expect(report.ok).toBe(true);
      expect(report.outcomes).toHaveLength(1);
      const [outcome] = report.outcomes;
      expect(outcome.status).toBe('succeeded');
      expect(outcome.version).toBe('v25.0');
      expect(outcome.buildSystem).toBe(BuildSystem.CMake);
      expect(outcome.checkout).toEqual({ path: checkoutDir, requestedTag: 'v25.0', resolvedCommit: 'c0ffee' });
      expect(outcome.result?.outputDir).toBe(outputDir);
      expect(outcome.result?.copiedArtifacts).toEqual(NODE_BINARIES.map(name => join(outputDir, name)));
      expect(outcome.result?.missingArtifacts).toEqual([]);

      expect(runner.commandLines()).toEqual([
        `git clone --depth 1 --branch v25.0 https://github.com/bitcoin/bitcoin.git ${checkoutDir}`,
        'git rev-parse HEAD',
        'git rev-parse HEAD',
        'git rev-list -n 1 v25.0',
        'cmake -B build -DENABLE_WALLET=OFF -DENABLE_IPC=OFF',
        'cmake --build build -j2'
      ]);
    });

    it('compiles with Apple Silicon flags and without Rust flags', async () => {
      const runner = upstreamRunner();
      await orchestrator(runner).run(request());

      const configure = findCall(runner, 'cmake -B');
      expect(configure?.cwd).toBe(join(buildDir, 'bitcoin-25.0'));
      expect(configure?.env?.CFLAGS).toBe('-mcpu=apple-m1 -O2 -fomit-frame-pointer -fno-common');
      expect(configure?.env?.RUSTFLAGS).toBeUndefined();
    });

    it('publishes phases, output and progress', async () => {
      const runner = upstreamRunner();
      const build = orchestrator(runner);
      const phases: BuildPhase[] = [];
      const progress: number[] = [];
      const output: string[] = [];
      const completed: TargetOutcome[] = [];
      build.on('phase', phase => phases.push(phase));
      build.on('progress', fraction => progress.push(fraction));
      build.on('output', (line, target) => output.push(`${target}: ${line}`));
      build.on('target:complete', outcome => completed.push(outcome));

      await build.run(request());

      expect(phases).toEqual([
        BuildPhase.ResolveVersion,
        BuildPhase.ComposeEnvironment,
        BuildPhase.FetchSource,
        BuildPhase.Verify,
        BuildPhase.Compile,
        BuildPhase.Collect,
        BuildPhase.Complete
      ]);
      expect(output).toContain('node-daemon: [100%] Built target bitcoind');
      expect(progress[0]).toBe(0);
      expect(progress[progress.length - 1]).toBe(1);
      expect(progress.every((value, index) => index === 0 || value >= progress[index - 1])).toBe(true);
      expect(build.progress).toBe(1);
      expect(completed.map(outcome => outcome.status)).toEqual(['succeeded']);
    });
  });

  it('builds the newest catalog version when none is requested', async () => {
    const runner = upstreamRunner();
    const report = await orchestrator(runner, createStaticGate(false), {
      catalogs: { [TargetId.NodeDaemon]: catalogOf('v24.2', 'v23.2') }
    }).run(request({ versions: {} }));

    expect(report.outcomes[0].version).toBe('v24.2');
    expect(report.outcomes[0].buildSystem).toBe(BuildSystem.Autotools);
    expect(report.outcomes[0].result?.outputDir).toBe(join(buildDir, 'binaries', 'bitcoin-24.2'));
    expect(runner.commandLines().slice(4)).toEqual([
      './autogen.sh',
      './configure --disable-wallet --disable-gui',
      'make -j2'
    ]);
  });

  it('fails without running commands when no version is available', async () => {
    const runner = upstreamRunner();
    const report = await orchestrator(runner).run(request({ versions: {} }));

    expect(report.ok).toBe(false);
    expect(report.outcomes[0].status).toBe('failed');
    expect(report.outcomes[0].failure?.kind).toBe(FailureKind.InvalidRequest);
    expect(report.outcomes[0].failure?.code).toBe(BuildErrorCode.VersionUnavailable);
    expect(report.outcomes[0].failure?.context.phase).toBe(BuildPhase.ResolveVersion);
    expect(runner.calls).toHaveLength(0);
  });

  it('refuses a version that is not a release tag', async () => {
    const runner = upstreamRunner();
    const report = await orchestrator(runner).run(request({ versions: { nodeDaemon: '../../escape' } }));

    expect(report.outcomes[0].status).toBe('failed');
    expect(report.outcomes[0].failure?.code).toBe(BuildErrorCode.InvalidConfig);
    expect(report.outcomes[0].failure?.details).toBe('"../../escape" is not a release tag');
    expect(runner.calls).toHaveLength(0);
  });

  it('skips catalog entries that are not release tags', async () => {
    const runner = upstreamRunner();
    const report = await orchestrator(runner, createStaticGate(false), {
      catalogs: { [TargetId.NodeDaemon]: catalogOf('--upload-pack=touch', 'v24.2') }
    }).run(request({ versions: {} }));

    expect(report.outcomes[0].version).toBe('v24.2');
  });

  describe('integrity verification', () => {
    it('fails on a commit mismatch when the override is declined', async () => {
      const runner = upstreamRunner({ head: 'c0ffee', tagged: 'decade' });
      const gate = trackingGate({ integrity: false });
      const report = await orchestrator(runner, gate).run(request());

      const [outcome] = report.outcomes;
      expect(outcome.status).toBe('failed');
      expect(outcome.failure?.kind).toBe(FailureKind.VerificationFailure);
      expect(outcome.failure?.code).toBe(BuildErrorCode.CommitMismatch);
      expect(outcome.failure?.context.target).toBe(TargetId.NodeDaemon);
      expect(outcome.failure?.context.version).toBe('v25.0');
      expect(gate.confirmIntegrityOverride).toHaveBeenCalledTimes(1);
      expect(findCall(runner, 'cmake')).toBeUndefined();
    });

    it('builds after the gate grants the override', async () => {
      const runner = upstreamRunner({ head: 'c0ffee', tagged: 'decade' });
      const report = await orchestrator(runner, trackingGate({ integrity: true })).run(request());

      expect(report.outcomes[0].status).toBe('succeeded');
    });

    it('builds without asking when the request allows unverified source', async () => {
      const runner = upstreamRunner({ head: 'c0ffee', tagged: 'decade' });
      const gate = trackingGate();
      const report = await orchestrator(runner, gate).run(request({ allowUnverifiedSource: true }));

      expect(report.outcomes[0].status).toBe('succeeded');
      expect(gate.confirmIntegrityOverride).not.toHaveBeenCalled();
    });
  });

  describe('aggressive optimizations', () => {
    it('cancels every target before any command when declined', async () => {
      const runner = upstreamRunner();
      const report = await orchestrator(runner, trackingGate({ aggressive: false })).run(
        request({ target: 'both', aggressiveOptimizations: true })
      );

      expect(report.ok).toBe(false);
      expect(report.outcomes.map(outcome => outcome.status)).toEqual(['cancelled', 'cancelled']);
      expect(report.outcomes[0].failure?.kind).toBe(FailureKind.Cancelled);
      expect(runner.calls).toHaveLength(0);
    });

    it('compiles with LTO once confirmed', async () => {
      const runner = upstreamRunner();
      const report = await orchestrator(runner, trackingGate({ aggressive: true })).run(
        request({ aggressiveOptimizations: true })
      );

      expect(report.ok).toBe(true);
      const compile = findCall(runner, 'cmake --build');
      expect(compile?.env?.LDFLAGS).toBe('-flto');
      expect(compile?.env?.CFLAGS).toBe(
        '-mcpu=apple-m1 -O2 -fomit-frame-pointer -fno-common -O3 -flto -march=armv8.5-a+fp16+crypto+dotprod'
      );
    });
  });

  describe('multiple targets', () => {
    const both = { target: 'both' as const, versions: { nodeDaemon: 'v25.0', indexer: 'v0.10.6' } };

    it('builds the node daemon then the indexer with Rust flags', async () => {
      const runner = upstreamRunner();
      const report = await orchestrator(runner, createStaticGate(false), {
        strategies: strategiesWithCargo(true)
      }).run(request(both));

      expect(report.ok).toBe(true);
      expect(report.outcomes.map(outcome => [outcome.target, outcome.status])).toEqual([
        [TargetId.NodeDaemon, 'succeeded'],
        [TargetId.Indexer, 'succeeded']
      ]);
      expect(report.outcomes[1].result?.copiedArtifacts).toEqual([
        join(buildDir, 'binaries', 'electrs-0.10.6', 'electrs')
      ]);
      const cargo = findCall(runner, 'cargo build');
      expect(cargo?.args).toEqual(['build', '--release', '--jobs', '2']);
      expect(cargo?.cwd).toBe(join(buildDir, 'electrs-0.10.6'));
      expect(cargo?.env?.RUSTFLAGS).toBe('-C opt-level=2 -C target-cpu=native');
    });

    it('skips remaining targets after a failure', async () => {
      const runner = upstreamRunner().on('cmake -B', spec => exitedWith(spec, 1, ['CMake Error at CMakeLists.txt']));
      const report = await orchestrator(runner, createStaticGate(false), {
        strategies: strategiesWithCargo(true)
      }).run(request(both));

      expect(report.ok).toBe(false);
      expect(report.outcomes.map(outcome => outcome.status)).toEqual(['failed', 'skipped']);
      expect(report.outcomes[0].failure?.kind).toBe(FailureKind.CommandFailure);
      expect(report.outcomes[0].failure?.context.phase).toBe(BuildPhase.Compile);
      expect(findCall(runner, 'git clone --depth 1 --branch v0.10.6')).toBeUndefined();
    });

    it('keeps going after a failure when asked to', async () => {
      const runner = upstreamRunner().on('cmake -B', spec => exitedWith(spec, 1));
      const report = await orchestrator(runner, createStaticGate(false), {
        strategies: strategiesWithCargo(true)
      }).run(request({ ...both, continueOnFailure: true }));

      expect(report.outcomes.map(outcome => outcome.status)).toEqual(['failed', 'succeeded']);
    });

    it('reports a missing Rust toolchain before building the indexer', async () => {
      const runner = upstreamRunner();
      const report = await orchestrator(runner, createStaticGate(false), {
        strategies: strategiesWithCargo(false)
      }).run(request({ target: TargetId.Indexer, versions: { indexer: 'v0.10.6' } }));

      expect(report.outcomes[0].status).toBe('failed');
      expect(report.outcomes[0].failure?.kind).toBe(FailureKind.ToolchainMissing);
      expect(report.outcomes[0].failure?.context.phase).toBe(BuildPhase.ComposeEnvironment);
      expect(runner.calls).toHaveLength(0);
    });
  });

  it('reports a build without binaries as failed with its result', async () => {
    const runner = upstreamRunner().on('cmake --build', () => undefined);
    const report = await orchestrator(runner).run(request());

    const [outcome] = report.outcomes;
    expect(outcome.status).toBe('failed');
    expect(outcome.failure?.kind).toBe(FailureKind.ArtifactMissing);
    expect(outcome.result?.copiedArtifacts).toEqual([]);
    expect(outcome.result?.missingArtifacts).toEqual(NODE_BINARIES);
  });

  it('throws the first failure from runOrThrow', async () => {
    const runner = upstreamRunner({ head: 'c0ffee', tagged: 'decade' });

    await expect(orchestrator(runner).runOrThrow(request())).rejects.toBeInstanceOf(BuildError);
    await expect(orchestrator(runner).runOrThrow(request())).rejects.toMatchObject({
      code: BuildErrorCode.CommitMismatch
    });
  });
});
