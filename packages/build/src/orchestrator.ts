/**
 * @fileoverview Build orchestration across targets
 *
 * The orchestrator sequences version resolution, environment composition,
 * checkout, verification, compilation and collection for each requested
 * target. It holds no presentation state: progress, phases and subprocess
 * output are published on its event stream, and every decision that needs a
 * human goes through a {@link ConfirmationGate}.
 */

import { EventEmitter } from 'eventemitter3';
import { ArtifactCollector } from './collect-artifacts';
import { selectStrategy, STRATEGY_TABLE, type BuildContext, type StrategyRule } from './compile';
import { expandTargets, getCheckoutDir, getOutputDir, TARGETS } from './config';
import { EnvironmentComposer, isHighRiskTier } from './environment';
import {
  BuildError,
  BuildErrorCode,
  createFailure,
  fail,
  FailureKind,
  ok,
  withFailureContext,
  type BuildFailure,
  type StageResult
} from './errors';
import { SourceAcquirer } from './fetch-source';
import { getHostArchitecture } from './platforms';
import {
  BuildPhase,
  LogLevel,
  OptimizationTier,
  TargetId,
  type Architecture,
  type BuildRequest,
  type BuildResult,
  type IntegrityReport,
  type OrchestrationReport,
  type TargetDefinition,
  type TargetOutcome,
  type TargetStatus
} from './types';
import { createLogger } from './utils/logger';
import { formatCommandLine, type CommandRunner } from './utils/process';
import { isReleaseTag } from './version';
import { VersionCatalog } from './version-catalog';
import { IntegrityVerifier } from './verify-source';

const logger = createLogger('orchestrator');

/**
 * Decisions the orchestrator delegates to the user
 */
export interface ConfirmationGate {
  /** Accept the risk of the aggressive optimization tier */
  confirmAggressiveOptimizations(): Promise<boolean>;
  /** Build from a checkout that failed integrity verification */
  confirmIntegrityOverride(report: IntegrityReport, target: TargetDefinition): Promise<boolean>;
}

/**
 * Gate that answers every question the same way, for non-interactive runs
 */
export function createStaticGate(answer: boolean): ConfirmationGate {
  return {
    confirmAggressiveOptimizations: async () => answer,
    confirmIntegrityOverride: async () => answer
  };
}

/** Anything that can list selectable versions, newest first */
export interface VersionSource {
  listVersions(): Promise<string[]>;
}

export interface BuildEventMap {
  log: (level: LogLevel, message: string, target?: TargetId) => void;
  output: (line: string, target: TargetId) => void;
  phase: (phase: BuildPhase, target: TargetId) => void;
  progress: (fraction: number) => void;
  'target:start': (target: TargetId) => void;
  'target:complete': (outcome: TargetOutcome) => void;
}

export interface BuildOrchestratorOptions {
  runner: CommandRunner;
  gate: ConfirmationGate;
  targets?: Record<TargetId, TargetDefinition>;
  catalogs?: Partial<Record<TargetId, VersionSource>>;
  composer?: EnvironmentComposer;
  acquirer?: SourceAcquirer;
  verifier?: IntegrityVerifier;
  collector?: ArtifactCollector;
  strategies?: readonly StrategyRule[];
  architecture?: Architecture;
}

/** Phases that advance progress, in pipeline order */
const PROGRESS_PHASES: readonly BuildPhase[] = [
  BuildPhase.ResolveVersion,
  BuildPhase.ComposeEnvironment,
  BuildPhase.FetchSource,
  BuildPhase.Verify,
  BuildPhase.Compile,
  BuildPhase.Collect
];

/** Partial outcome filled in while a target's pipeline runs */
type OutcomeDraft = Omit<TargetOutcome, 'status' | 'failure' | 'duration'>;

interface RunPosition {
  index: number;
  total: number;
}

export class BuildOrchestrator extends EventEmitter<BuildEventMap> {
  private readonly runner: CommandRunner;
  private readonly gate: ConfirmationGate;
  private readonly targets: Record<TargetId, TargetDefinition>;
  private readonly catalogs: Record<TargetId, VersionSource>;
  private readonly composer: EnvironmentComposer;
  private readonly acquirer: SourceAcquirer;
  private readonly verifier: IntegrityVerifier;
  private readonly collector: ArtifactCollector;
  private readonly strategies: readonly StrategyRule[];
  private readonly architecture: Architecture;
  private currentProgress = 0;
  private running = false;

  constructor(options: BuildOrchestratorOptions) {
    super();
    this.runner = options.runner;
    this.gate = options.gate;
    this.targets = options.targets ?? TARGETS;
    this.catalogs = {
      [TargetId.NodeDaemon]: options.catalogs?.[TargetId.NodeDaemon]
        ?? new VersionCatalog(this.targets[TargetId.NodeDaemon]),
      [TargetId.Indexer]: options.catalogs?.[TargetId.Indexer]
        ?? new VersionCatalog(this.targets[TargetId.Indexer])
    };
    this.composer = options.composer ?? new EnvironmentComposer();
    this.acquirer = options.acquirer ?? new SourceAcquirer(this.runner);
    this.verifier = options.verifier ?? new IntegrityVerifier(this.runner);
    this.collector = options.collector ?? new ArtifactCollector();
    this.strategies = options.strategies ?? STRATEGY_TABLE;
    this.architecture = options.architecture ?? getHostArchitecture();
  }

  /** Fraction of the current run completed, in [0, 1] */
  get progress(): number {
    return this.currentProgress;
  }

  /**
   * Build every requested target in order.
   *
   * Never throws for a failed build; failures are reported per target.
   */
  async run(request: BuildRequest): Promise<OrchestrationReport> {
    if (this.running) {
      throw new BuildError(BuildErrorCode.InvalidConfig, 'an orchestration run is already in progress');
    }

    this.running = true;
    try {
      return await this.runTargets(request);
    } finally {
      this.running = false;
    }
  }

  /**
   * Like {@link run}, but throws the first failure as a {@link BuildError}
   */
  async runOrThrow(request: BuildRequest): Promise<OrchestrationReport> {
    const report = await this.run(request);
    const failed = report.outcomes.find(outcome => outcome.failure !== undefined);
    if (!report.ok && failed?.failure) {
      throw BuildError.fromFailure(failed.failure);
    }
    return report;
  }

  private async runTargets(request: BuildRequest): Promise<OrchestrationReport> {
    this.currentProgress = 0;
    this.emit('progress', 0);

    const targetIds = expandTargets(request.target);
    const tier = request.aggressiveOptimizations ? OptimizationTier.Aggressive : OptimizationTier.Standard;
    const outcomes: TargetOutcome[] = [];

    if (isHighRiskTier(tier)) {
      this.report(LogLevel.Warn, 'Aggressive optimizations may cause build failures or runtime instability');
      const confirmed = await this.gate.confirmAggressiveOptimizations();
      if (!confirmed) {
        const failure = createFailure(
          BuildErrorCode.AggressiveOptimizationsDeclined,
          'build cancelled before any command ran'
        );
        for (const target of targetIds) {
          outcomes.push(this.complete({ target }, 'cancelled', 0, withFailureContext(failure, { target })));
        }
        return this.finish(outcomes);
      }
    }

    let aborted = false;
    for (const [index, target] of targetIds.entries()) {
      const position = { index, total: targetIds.length };

      if (aborted) {
        outcomes.push(this.complete({ target }, 'skipped', 0));
        this.advance(position, PROGRESS_PHASES.length);
        continue;
      }

      const outcome = await this.buildTarget(this.targets[target], request, tier, position);
      outcomes.push(outcome);
      this.advance(position, PROGRESS_PHASES.length);

      if ((outcome.status === 'failed' || outcome.status === 'cancelled') && !request.continueOnFailure) {
        aborted = true;
      }
    }

    return this.finish(outcomes);
  }

  private async buildTarget(
    target: TargetDefinition,
    request: BuildRequest,
    tier: OptimizationTier,
    position: RunPosition
  ): Promise<TargetOutcome> {
    const startedAt = Date.now();
    const draft: OutcomeDraft = { target: target.id };

    this.emit('target:start', target.id);
    this.report(LogLevel.Info, `Building ${target.displayName}`, target.id);

    const result = await this.runPipeline(target, request, tier, position, draft);
    const duration = Date.now() - startedAt;

    if (result.ok) {
      this.report(LogLevel.Info, `${target.displayName} built successfully`, target.id);
      return this.complete({ ...draft, result: result.value }, 'succeeded', duration);
    }

    const failure = result.failure;
    switch (failure.kind) {
      case FailureKind.Cancelled:
        this.report(LogLevel.Warn, failure.message, target.id);
        return this.complete(draft, 'cancelled', duration, failure);
      case FailureKind.ArtifactMissing:
        this.report(LogLevel.Warn, failure.message, target.id);
        return this.complete({ ...draft, result: failure.context.result }, 'failed', duration, failure);
      default:
        this.report(LogLevel.Error, failure.message, target.id);
        return this.complete(draft, 'failed', duration, failure);
    }
  }

  private async runPipeline(
    target: TargetDefinition,
    request: BuildRequest,
    tier: OptimizationTier,
    position: RunPosition,
    draft: OutcomeDraft
  ): Promise<StageResult<BuildResult>> {
    const onLine = (line: string): void => {
      this.emit('output', line, target.id);
    };
    let phase = BuildPhase.ResolveVersion;
    const enter = (next: BuildPhase): void => {
      phase = next;
      this.emit('phase', next, target.id);
    };
    const done = (): void => {
      this.advance(position, PROGRESS_PHASES.indexOf(phase) + 1);
    };
    const failed = (failure: BuildFailure): StageResult<BuildResult> =>
      fail(withFailureContext(failure, { target: target.id, version: draft.version, phase }));

    enter(BuildPhase.ResolveVersion);
    const version = await this.resolveVersion(target, request);
    if (!version.ok) {
      return failed(version.failure);
    }
    draft.version = version.value;
    done();

    enter(BuildPhase.ComposeEnvironment);
    const env = this.composer.compose(this.architecture, tier, { rust: target.rust });
    const checkoutDir = getCheckoutDir(request.buildDir, target, version.value);

    // Toolchain preflight happens before any git work
    const strategy = selectStrategy(target.id, version.value, this.strategies);
    if (!strategy) {
      return failed(createFailure(
        BuildErrorCode.InvalidTarget,
        `no build strategy for ${target.id} ${version.value}`
      ));
    }
    draft.buildSystem = strategy.system;

    const context: BuildContext = { target, sourceDir: checkoutDir, jobs: request.jobs, env };
    const preflight = strategy.preflight(context);
    if (!preflight.ok) {
      return failed(preflight.failure);
    }
    done();

    enter(BuildPhase.FetchSource);
    const checkout = await this.acquirer.acquire(target.repoUrl, version.value, checkoutDir, env, onLine);
    if (!checkout.ok) {
      return failed(checkout.failure);
    }
    draft.checkout = checkout.value;
    done();

    enter(BuildPhase.Verify);
    const integrity = await this.verifier.verify(checkoutDir, version.value, env);
    if (!integrity.verified) {
      const accepted = await this.acceptUnverified(integrity, target, request);
      if (!accepted.ok) {
        return failed(accepted.failure);
      }
    }
    done();

    enter(BuildPhase.Compile);
    this.report(LogLevel.Info, `Using ${strategy.system} with ${request.jobs} jobs`, target.id);
    const compiled = await strategy.run(context, this.runner, {
      onStep: step => {
        this.report(LogLevel.Info, step.label, target.id);
        logger.debug(`$ ${formatCommandLine(step.spec)}`);
      },
      onLine
    });
    if (!compiled.ok) {
      return failed(compiled.failure);
    }
    done();

    enter(BuildPhase.Collect);
    const outputDir = getOutputDir(request.buildDir, target, version.value);
    const collected = await this.collector.collect(strategy.expectedArtifacts(context), outputDir);
    if (!collected.ok) {
      return failed(collected.failure);
    }
    done();

    enter(BuildPhase.Complete);
    return ok(collected.value);
  }

  /**
   * Explicit request value first, newest catalog entry otherwise
   */
  private async resolveVersion(target: TargetDefinition, request: BuildRequest): Promise<StageResult<string>> {
    const requested = target.id === TargetId.NodeDaemon ? request.versions.nodeDaemon : request.versions.indexer;
    if (requested) {
      if (!isReleaseTag(requested)) {
        return fail(createFailure(BuildErrorCode.InvalidConfig, `"${requested}" is not a release tag`));
      }
      return ok(requested);
    }

    const latest = (await this.catalogs[target.id].listVersions()).find(isReleaseTag);
    if (!latest) {
      return fail(createFailure(
        BuildErrorCode.VersionUnavailable,
        `could not list ${target.displayName} releases; pass a version explicitly`
      ));
    }

    this.report(LogLevel.Info, `Selected latest ${target.displayName} release ${latest}`, target.id);
    return ok(latest);
  }

  private async acceptUnverified(
    report: IntegrityReport,
    target: TargetDefinition,
    request: BuildRequest
  ): Promise<StageResult<void>> {
    this.report(LogLevel.Warn, `Integrity check failed for ${report.expectedTag}: ${report.reason ?? 'unknown reason'}`, target.id);

    if (request.allowUnverifiedSource) {
      this.report(LogLevel.Warn, 'Continuing with unverified source as requested', target.id);
      return ok(undefined);
    }

    if (await this.gate.confirmIntegrityOverride(report, target)) {
      this.report(LogLevel.Warn, 'Continuing with unverified source after confirmation', target.id);
      return ok(undefined);
    }

    const code = report.currentCommit && report.expectedCommit
      ? BuildErrorCode.CommitMismatch
      : BuildErrorCode.CommitUnresolved;
    return fail(createFailure(code, report.reason ?? report.expectedTag, {
      metadata: {
        currentCommit: report.currentCommit,
        expectedCommit: report.expectedCommit
      }
    }));
  }

  private complete(
    draft: OutcomeDraft,
    status: TargetStatus,
    duration: number,
    failure?: BuildFailure
  ): TargetOutcome {
    const outcome: TargetOutcome = { ...draft, status, duration, ...(failure ? { failure } : {}) };
    this.emit('target:complete', outcome);
    return outcome;
  }

  private finish(outcomes: TargetOutcome[]): OrchestrationReport {
    this.setProgress(1);
    return {
      ok: outcomes.every(outcome => outcome.status !== 'failed' && outcome.status !== 'cancelled'),
      outcomes
    };
  }

  private advance(position: RunPosition, completedPhases: number): void {
    const units = PROGRESS_PHASES.length * position.total;
    this.setProgress((position.index * PROGRESS_PHASES.length + completedPhases) / units);
  }

  private setProgress(fraction: number): void {
    const next = Math.min(1, Math.max(this.currentProgress, fraction));
    if (next !== this.currentProgress) {
      this.currentProgress = next;
      this.emit('progress', next);
    }
  }

  private report(level: LogLevel, message: string, target?: TargetId): void {
    logger.debug(message);
    this.emit('log', level, message, target);
  }
}
