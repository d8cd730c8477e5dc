/**
 * Core type definitions for the binforge build engine
 */

import type { BuildFailure } from './errors';

/** Host CPU families */
export enum Architecture {
  AppleSilicon = 'apple-silicon',
  Intel = 'intel',
  Unknown = 'unknown'
}

/** Named bundles of compiler and linker flags */
export enum OptimizationTier {
  Standard = 'standard',
  Aggressive = 'aggressive'
}

/** Upstream projects binforge knows how to build */
export enum TargetId {
  NodeDaemon = 'node-daemon',
  Indexer = 'indexer'
}

/** Target selection accepted from the caller */
export type TargetSelection = TargetId | 'both';

/** Build systems a strategy can drive */
export enum BuildSystem {
  Autotools = 'autotools',
  CMake = 'cmake',
  CargoRelease = 'cargo-release'
}

/** Log levels for build process */
export enum LogLevel {
  Error = 'error',
  Warn = 'warn',
  Info = 'info',
  Debug = 'debug',
  Trace = 'trace'
}

/** Pipeline phases of a single target */
export enum BuildPhase {
  ResolveVersion = 'resolve-version',
  ComposeEnvironment = 'compose-environment',
  FetchSource = 'fetch-source',
  Verify = 'verify',
  Compile = 'compile',
  Collect = 'collect',
  Complete = 'complete'
}

/** Version key used for ordering release tags */
export interface VersionKey {
  major: number;
  minor: number;
  patch: number;
}

/** How a target's release listing is reduced to selectable versions */
export type CatalogPolicy =
  | { mode: 'grouped'; maxGroups: number; scanLimit: number }
  | { mode: 'latest'; count: number };

/** Fixed description of an upstream project */
export interface TargetDefinition {
  id: TargetId;
  /** Human-readable project name */
  displayName: string;
  /** Git repository to clone */
  repoUrl: string;
  /** GitHub releases endpoint */
  releasesUrl: string;
  /** Prefix of checkout and output directory names */
  directoryPrefix: string;
  /** Whether the build needs the Rust toolchain flags */
  rust: boolean;
  catalog: CatalogPolicy;
  /** Expected binary names per build system */
  binaries: Partial<Record<BuildSystem, readonly string[]>>;
}

/** Environment overlay handed to one subprocess invocation */
export type BuildEnvironment = Readonly<Record<string, string>>;

export interface SourceCheckout {
  /** Checkout directory */
  path: string;
  /** Tag that was requested */
  requestedTag: string;
  /** HEAD commit after a successful checkout */
  resolvedCommit?: string;
}

export interface BuildResult {
  /** Directory the binaries were copied into */
  outputDir: string;
  /** Destination paths of copied binaries */
  copiedArtifacts: string[];
  /** Names of expected binaries that were not found */
  missingArtifacts: string[];
  /** SHA-256 digest per copied binary name */
  checksums: Record<string, string>;
}

export interface IntegrityReport {
  verified: boolean;
  expectedTag: string;
  currentCommit?: string;
  expectedCommit?: string;
  /** Why verification did not pass */
  reason?: string;
}

/** Caller-facing request, the replacement for presentation globals */
export interface BuildRequest {
  target: TargetSelection;
  /** Parallel compile jobs */
  jobs: number;
  /** Root of checkouts and collected binaries */
  buildDir: string;
  aggressiveOptimizations: boolean;
  /** Independently selected versions; newest catalog entry when absent */
  versions: {
    nodeDaemon?: string;
    indexer?: string;
  };
  /** Proceed past a failed integrity check without asking */
  allowUnverifiedSource: boolean;
  /** Keep building remaining targets after one fails */
  continueOnFailure: boolean;
}

export type TargetStatus = 'succeeded' | 'failed' | 'cancelled' | 'skipped';

export interface TargetOutcome {
  target: TargetId;
  status: TargetStatus;
  version?: string;
  buildSystem?: BuildSystem;
  checkout?: SourceCheckout;
  result?: BuildResult;
  failure?: BuildFailure;
  /** Milliseconds spent on this target */
  duration: number;
}

export interface OrchestrationReport {
  ok: boolean;
  outcomes: TargetOutcome[];
}
