/**
 * @fileoverview Error codes for the build orchestration engine
 *
 * Error codes are organized by category using numeric ranges:
 * - 1000-1099: Request and configuration errors
 * - 2000-2099: Release catalog and network errors
 * - 3000-3099: Toolchain errors
 * - 4000-4099: Source verification errors
 * - 5000-5099: Process errors
 * - 6000-6099: Artifact errors
 * - 7000-7099: User confirmation gates
 */

/**
 * Failure kinds the orchestrator pattern-matches on to decide between
 * failing fast, asking the user, and degrading softly
 */
export enum FailureKind {
  NetworkFailure = 'network-failure',
  ToolchainMissing = 'toolchain-missing',
  VerificationFailure = 'verification-failure',
  CommandFailure = 'command-failure',
  ArtifactMissing = 'artifact-missing',
  InvalidRequest = 'invalid-request',
  Cancelled = 'cancelled',
}

export enum BuildErrorCode {
  // Request and configuration errors (1000-1099)
  InvalidConfig = 1000,
  InvalidTarget = 1001,
  VersionUnavailable = 1002,
  InvalidJobCount = 1003,

  // Release catalog errors (2000-2099)
  CatalogFetchFailed = 2000,
  CatalogParseFailed = 2001,

  // Toolchain errors (3000-3099)
  RustcNotFound = 3000,
  CargoNotFound = 3001,
  PackageManagerNotFound = 3002,

  // Verification errors (4000-4099)
  CommitMismatch = 4000,
  CommitUnresolved = 4001,

  // Process errors (5000-5099)
  ProcessFailed = 5000,
  ProcessSpawnFailed = 5001,
  SourceDirectoryFailed = 5002,

  // Artifact errors (6000-6099)
  NoArtifactsCollected = 6000,

  // Confirmation gates (7000-7099)
  AggressiveOptimizationsDeclined = 7000,
}

/**
 * Map an error code to its failure kind using the numeric range
 */
export function getFailureKind(code: BuildErrorCode): FailureKind {
  if (code >= 1000 && code < 2000) {
    return FailureKind.InvalidRequest;
  }
  if (code >= 2000 && code < 3000) {
    return FailureKind.NetworkFailure;
  }
  if (code >= 3000 && code < 4000) {
    return FailureKind.ToolchainMissing;
  }
  if (code >= 4000 && code < 5000) {
    return FailureKind.VerificationFailure;
  }
  if (code >= 5000 && code < 6000) {
    return FailureKind.CommandFailure;
  }
  if (code >= 6000 && code < 7000) {
    return FailureKind.ArtifactMissing;
  }
  return FailureKind.Cancelled;
}

const MESSAGES: Record<BuildErrorCode, string> = {
  [BuildErrorCode.InvalidConfig]: 'Invalid build request',
  [BuildErrorCode.InvalidTarget]: 'Invalid build target',
  [BuildErrorCode.VersionUnavailable]: 'No version available to build',
  [BuildErrorCode.InvalidJobCount]: 'Invalid job count',
  [BuildErrorCode.CatalogFetchFailed]: 'Release listing could not be fetched',
  [BuildErrorCode.CatalogParseFailed]: 'Release listing could not be parsed',
  [BuildErrorCode.RustcNotFound]: 'Rust compiler not found',
  [BuildErrorCode.CargoNotFound]: 'Cargo not found',
  [BuildErrorCode.PackageManagerNotFound]: 'Homebrew not found',
  [BuildErrorCode.CommitMismatch]: 'Checked-out commit does not match the release tag',
  [BuildErrorCode.CommitUnresolved]: 'Source commit could not be resolved',
  [BuildErrorCode.ProcessFailed]: 'External command failed',
  [BuildErrorCode.ProcessSpawnFailed]: 'External command could not be started',
  [BuildErrorCode.SourceDirectoryFailed]: 'Source directory could not be prepared',
  [BuildErrorCode.NoArtifactsCollected]: 'Build produced no usable binaries',
  [BuildErrorCode.AggressiveOptimizationsDeclined]: 'Aggressive optimizations were not confirmed',
};

export function getMessageForCode(code: BuildErrorCode): string {
  return MESSAGES[code] ?? 'Unknown build error';
}
