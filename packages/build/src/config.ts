/**
 * Build configuration management and constants
 */

import { cpus, homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import {
  BuildSystem,
  LogLevel,
  TargetId,
  type BuildRequest,
  type TargetDefinition,
} from './types';
import { BuildErrorCode, createFailure, fail, ok, type StageResult } from './errors';
import { RELEASE_TAG_PATTERN } from './version';

/** Default configuration values */
export const DEFAULT_CONFIG = {
  /** Root of checkouts and collected binaries */
  BUILD_DIR: join(homedir(), 'Downloads', 'bitcoin_builds'),

  /** Collected binaries live under this subdirectory of the build dir */
  BINARIES_DIR: 'binaries',

  /** Default log level */
  LOG_LEVEL: LogLevel.Info,

  /** Release listing request timeout in milliseconds */
  CATALOG_TIMEOUT: 10000,

  /** Retry attempts for the release listing */
  CATALOG_RETRIES: 2,

  /** Delay before the first catalog retry in milliseconds */
  RETRY_DELAY: 500,

  /** Lines of command output kept for failure reports */
  OUTPUT_TAIL_LINES: 50
};

/** Environment variable names */
export const ENV_VARS = {
  /** Build directory override */
  BUILD_DIR: 'BINFORGE_BUILD_DIR',

  /** Parallel jobs */
  JOBS: 'BINFORGE_JOBS',

  /** Log level */
  LOG_LEVEL: 'BINFORGE_LOG_LEVEL'
};

/** Upstream project definitions */
export const TARGETS: Record<TargetId, TargetDefinition> = {
  [TargetId.NodeDaemon]: {
    id: TargetId.NodeDaemon,
    displayName: 'Bitcoin Core',
    repoUrl: 'https://github.com/bitcoin/bitcoin.git',
    releasesUrl: 'https://api.github.com/repos/bitcoin/bitcoin/releases',
    directoryPrefix: 'bitcoin',
    rust: false,
    catalog: { mode: 'grouped', maxGroups: 5, scanLimit: 20 },
    binaries: {
      [BuildSystem.CMake]: ['bitcoind', 'bitcoin-cli', 'bitcoin-tx', 'bitcoin-wallet', 'bitcoin-util'],
      [BuildSystem.Autotools]: ['bitcoind', 'bitcoin-cli', 'bitcoin-tx', 'bitcoin-wallet']
    }
  },
  [TargetId.Indexer]: {
    id: TargetId.Indexer,
    displayName: 'Electrs',
    repoUrl: 'https://github.com/romanz/electrs.git',
    releasesUrl: 'https://api.github.com/repos/romanz/electrs/releases',
    directoryPrefix: 'electrs',
    rust: true,
    catalog: { mode: 'latest', count: 3 },
    binaries: {
      [BuildSystem.CargoRelease]: ['electrs']
    }
  }
};

/** Toolchain locations on the supported host family */
export const TOOLCHAIN_PATHS = {
  /** Homebrew executables, Apple Silicon first */
  BREW_CANDIDATES: ['/opt/homebrew/bin/brew', '/usr/local/bin/brew'],

  /** Well-known toolchain install roots */
  ROOTS: ['/opt/homebrew/bin', '/usr/local/bin'],

  /** LLVM prefixes outside the detected Homebrew prefix */
  LLVM_PREFIXES: ['/opt/homebrew/opt/llvm', '/usr/local/opt/llvm'],

  /** User-local Cargo bin directory, relative to the home directory */
  CARGO_HOME_BIN: join('.cargo', 'bin')
};

/** Homebrew formulae needed to build both targets */
export const HOMEBREW_FORMULAE = [
  'automake',
  'libtool',
  'pkg-config',
  'boost',
  'miniupnpc',
  'zeromq',
  'sqlite',
  'python',
  'cmake',
  'llvm',
  'libevent',
  'rocksdb',
  'rust',
  'git'
];

/** First node daemon release line built with CMake */
export const CMAKE_MIN_MAJOR = 25;

/**
 * Host core count, never below one
 */
export function getHostCoreCount(): number {
  return Math.max(1, cpus().length);
}

/**
 * Default parallelism leaves one core for the rest of the machine
 */
export function getDefaultJobs(coreCount: number = getHostCoreCount()): number {
  return Math.max(1, coreCount - 1);
}

/**
 * Collected binaries directory for a target and version
 */
export function getOutputDir(buildDir: string, target: TargetDefinition, version: string): string {
  return join(buildDir, DEFAULT_CONFIG.BINARIES_DIR, `${target.directoryPrefix}-${cleanVersion(version)}`);
}

/**
 * Checkout directory for a target and version
 */
export function getCheckoutDir(buildDir: string, target: TargetDefinition, version: string): string {
  return join(buildDir, `${target.directoryPrefix}-${cleanVersion(version)}`);
}

/**
 * Strip the leading `v` of a release tag
 */
export function cleanVersion(tag: string): string {
  return tag.replace(/^v/, '');
}

/**
 * Build the request schema against a host core count
 */
export function createBuildRequestSchema(coreCount: number = getHostCoreCount()) {
  const releaseTag = z.string().regex(RELEASE_TAG_PATTERN, 'Version must be a release tag such as v25.0');

  return z.object({
    target: z.union([z.nativeEnum(TargetId), z.literal('both')], {
      errorMap: () => ({ message: 'Target must be node-daemon, indexer, or both' })
    }),
    jobs: z.number()
      .int('Job count must be an integer')
      .min(1, 'Job count must be at least 1')
      .max(coreCount, `Job count must not exceed ${coreCount} host cores`),
    buildDir: z.string().min(1, 'Build directory is required'),
    aggressiveOptimizations: z.boolean(),
    versions: z.object({
      nodeDaemon: releaseTag.optional(),
      indexer: releaseTag.optional()
    }),
    allowUnverifiedSource: z.boolean(),
    continueOnFailure: z.boolean()
  });
}

/** Partial request as assembled by a front end */
export interface BuildRequestInput {
  target?: string;
  jobs?: number;
  buildDir?: string;
  aggressiveOptimizations?: boolean;
  versions?: {
    nodeDaemon?: string;
    indexer?: string;
  };
  allowUnverifiedSource?: boolean;
  continueOnFailure?: boolean;
}

/**
 * Merge caller input over environment values over defaults, then validate
 */
export function resolveBuildRequest(
  input: BuildRequestInput,
  env: NodeJS.ProcessEnv = process.env,
  coreCount: number = getHostCoreCount()
): StageResult<BuildRequest> {
  const envJobs = env[ENV_VARS.JOBS];
  const candidate = {
    target: input.target ?? TargetId.NodeDaemon,
    jobs: input.jobs ?? (envJobs !== undefined ? Number(envJobs) : getDefaultJobs(coreCount)),
    buildDir: input.buildDir ?? env[ENV_VARS.BUILD_DIR] ?? DEFAULT_CONFIG.BUILD_DIR,
    aggressiveOptimizations: input.aggressiveOptimizations ?? false,
    versions: {
      nodeDaemon: input.versions?.nodeDaemon,
      indexer: input.versions?.indexer
    },
    allowUnverifiedSource: input.allowUnverifiedSource ?? false,
    continueOnFailure: input.continueOnFailure ?? false
  };

  const parsed = createBuildRequestSchema(coreCount).safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.errors;
    const errors = issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    const code = issues.every(issue => issue.path[0] === 'jobs')
      ? BuildErrorCode.InvalidJobCount
      : BuildErrorCode.InvalidConfig;
    return fail(createFailure(code, errors.join('; '), {
      metadata: { errors }
    }));
  }

  return ok(parsed.data);
}

/**
 * Targets a selection expands to, in build order
 */
export function expandTargets(selection: BuildRequest['target']): TargetId[] {
  return selection === 'both' ? [TargetId.NodeDaemon, TargetId.Indexer] : [selection];
}
