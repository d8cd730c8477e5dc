/**
 * Host architecture detection
 */

import { machine } from 'os';
import { Architecture } from './types';

/**
 * Map a machine hardware name (`uname -m`) to an architecture
 */
export function detectArchitecture(machineName: string): Architecture {
  switch (machineName) {
    case 'arm64':
    case 'aarch64':
      return Architecture.AppleSilicon;
    case 'x86_64':
    case 'x64':
      return Architecture.Intel;
    default:
      return Architecture.Unknown;
  }
}

let hostArchitecture: Architecture | undefined;

/**
 * Host architecture, probed on first use and fixed for the process lifetime
 */
export function getHostArchitecture(): Architecture {
  if (hostArchitecture === undefined) {
    hostArchitecture = detectArchitecture(machine());
  }
  return hostArchitecture;
}

export function describeArchitecture(arch: Architecture): string {
  switch (arch) {
    case Architecture.AppleSilicon:
      return 'APPLE-SILICON (Apple Silicon)';
    case Architecture.Intel:
      return 'INTEL (Intel Mac)';
    case Architecture.Unknown:
      return 'UNKNOWN';
  }
}
