/**
 * Compiler and toolchain environment composition
 */

import { accessSync, constants, existsSync, statSync } from 'fs';
import { homedir } from 'os';
import { delimiter, join } from 'path';
import { TOOLCHAIN_PATHS } from './config';
import { Architecture, OptimizationTier, type BuildEnvironment } from './types';
import { createLogger } from './utils/logger';

const logger = createLogger('environment');

/** C and C++ compiler flags for one architecture and tier */
export interface CompilerFlags {
  CFLAGS: string;
  CXXFLAGS: string;
  LDFLAGS: string;
}

/** Filesystem probes the composer depends on */
export interface EnvironmentProbe {
  isDirectory(path: string): boolean;
  isFile(path: string): boolean;
}

export interface EnvironmentComposerOptions {
  /** Environment inherited by every composition; copied, never written */
  baseEnv: NodeJS.ProcessEnv;
  homeDir: string;
  probe: EnvironmentProbe;
}

export interface ComposeOptions {
  /** Add the Rust/Cargo optimization variables */
  rust?: boolean;
}

export const fsProbe: EnvironmentProbe = {
  isDirectory: (path) => existsSync(path) && statSync(path).isDirectory(),
  isFile: (path) => existsSync(path) && statSync(path).isFile()
};

const BASELINE_FLAGS: Record<Architecture, string[]> = {
  [Architecture.AppleSilicon]: ['-mcpu=apple-m1', '-O2', '-fomit-frame-pointer', '-fno-common'],
  [Architecture.Intel]: ['-march=native', '-O2', '-fomit-frame-pointer', '-fno-common'],
  [Architecture.Unknown]: ['-O2']
};

const AGGRESSIVE_FLAGS: Record<Architecture, string[]> = {
  [Architecture.AppleSilicon]: ['-O3', '-flto', '-march=armv8.5-a+fp16+crypto+dotprod'],
  [Architecture.Intel]: ['-O3', '-flto', '-mtune=native'],
  [Architecture.Unknown]: []
};

/**
 * Compiler flags for an architecture and optimization tier
 */
export function getCompilerFlags(arch: Architecture, tier: OptimizationTier): CompilerFlags {
  const extra = tier === OptimizationTier.Aggressive ? AGGRESSIVE_FLAGS[arch] : [];
  const flags = [...BASELINE_FLAGS[arch], ...extra].join(' ');

  return {
    CFLAGS: flags,
    CXXFLAGS: flags,
    LDFLAGS: extra.includes('-flto') ? '-flto' : ''
  };
}

/**
 * Rust and Cargo release-profile variables for a tier.
 *
 * Fat LTO is only valid together with `embed-bitcode=yes`.
 */
export function getRustFlags(tier: OptimizationTier): Record<string, string> {
  if (tier === OptimizationTier.Aggressive) {
    return {
      RUSTFLAGS: '-C opt-level=3 -C target-cpu=native',
      CARGO_PROFILE_RELEASE_LTO: 'fat',
      CARGO_PROFILE_RELEASE_OPT_LEVEL: '3',
      CARGO_PROFILE_RELEASE_EMBED_BITCODE: 'yes'
    };
  }

  return {
    RUSTFLAGS: '-C opt-level=2 -C target-cpu=native',
    CARGO_PROFILE_RELEASE_OPT_LEVEL: '2'
  };
}

/**
 * The aggressive tier may fail to build or misbehave at runtime
 */
export function isHighRiskTier(tier: OptimizationTier): boolean {
  return tier === OptimizationTier.Aggressive;
}

/**
 * Drop empty and repeated entries, keeping the first occurrence
 */
export function dedupeSearchPath(entries: readonly string[]): string[] {
  return Array.from(new Set(entries.filter(entry => entry.length > 0)));
}

export function splitSearchPath(value: string | undefined): string[] {
  return value ? value.split(delimiter) : [];
}

/**
 * Locate an executable on a composed environment's PATH
 */
export function findExecutable(
  name: string,
  env: BuildEnvironment,
  isExecutable: (path: string) => boolean = isExecutableFile
): string | undefined {
  for (const dir of splitSearchPath(env.PATH)) {
    const candidate = join(dir, name);
    if (isExecutable(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

function isExecutableFile(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

const DEFAULT_COMPOSER_OPTIONS: EnvironmentComposerOptions = {
  baseEnv: process.env,
  homeDir: homedir(),
  probe: fsProbe
};

/**
 * Builds isolated environment overlays for subprocess invocations.
 *
 * Every call returns a fresh mapping. Nothing is written back to the base
 * environment.
 */
export class EnvironmentComposer {
  private readonly options: EnvironmentComposerOptions;

  constructor(options: Partial<EnvironmentComposerOptions> = {}) {
    this.options = { ...DEFAULT_COMPOSER_OPTIONS, ...options };
  }

  compose(arch: Architecture, tier: OptimizationTier, options: ComposeOptions = {}): BuildEnvironment {
    const env: Record<string, string> = {};

    for (const [key, value] of Object.entries(this.options.baseEnv)) {
      if (value !== undefined) {
        env[key] = value;
      }
    }

    env.PATH = this.composeSearchPath().join(delimiter);

    const llvmPrefix = this.findLlvmPrefix();
    if (llvmPrefix) {
      env.LIBCLANG_PATH = join(llvmPrefix, 'lib');
      env.DYLD_LIBRARY_PATH = join(llvmPrefix, 'lib');
    }

    const flags: Record<string, string> = {
      ...getCompilerFlags(arch, tier),
      ...(options.rust ? getRustFlags(tier) : {})
    };

    for (const [key, value] of Object.entries(flags)) {
      if (value) {
        env[key] = value;
        logger.debug(`${key}: ${value}`);
      }
    }

    return env;
  }

  /**
   * Toolchain directories that exist, then the inherited PATH, deduplicated
   */
  composeSearchPath(): string[] {
    const { probe, homeDir, baseEnv } = this.options;
    const brewPrefix = this.findBrewPrefix();

    const discovered = [
      ...(brewPrefix ? [join(brewPrefix, 'bin')] : []),
      ...TOOLCHAIN_PATHS.ROOTS,
      join(homeDir, TOOLCHAIN_PATHS.CARGO_HOME_BIN),
      ...this.llvmPrefixes().map(prefix => join(prefix, 'bin'))
    ].filter(dir => probe.isDirectory(dir));

    if (!brewPrefix) {
      logger.debug('Homebrew prefix not detected, using defaults');
    }

    return dedupeSearchPath([...discovered, ...splitSearchPath(baseEnv.PATH)]);
  }

  /**
   * Homebrew executable, Apple Silicon location first
   */
  findBrew(): string | undefined {
    return TOOLCHAIN_PATHS.BREW_CANDIDATES.find(candidate => this.options.probe.isFile(candidate));
  }

  findBrewPrefix(): string | undefined {
    const brew = this.findBrew();
    if (!brew) {
      return undefined;
    }
    return brew.startsWith('/opt/homebrew') ? '/opt/homebrew' : '/usr/local';
  }

  private llvmPrefixes(): string[] {
    const brewPrefix = this.findBrewPrefix();
    return dedupeSearchPath([
      ...(brewPrefix ? [join(brewPrefix, 'opt', 'llvm')] : []),
      ...TOOLCHAIN_PATHS.LLVM_PREFIXES
    ]);
  }

  private findLlvmPrefix(): string | undefined {
    return this.llvmPrefixes().find(prefix => this.options.probe.isDirectory(prefix));
  }
}
