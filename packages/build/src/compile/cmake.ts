/**
 * @fileoverview CMake pipeline for node daemon releases from v25 on
 */

import { join } from 'path';
import { BuildSystem } from '../types';
import { CommandSequenceStrategy, type BuildContext, type BuildStep } from './strategy';

/** Out-of-tree build directory, relative to the checkout */
export const CMAKE_BUILD_DIR = 'build';

/** Node-only build: wallet and multiprocess IPC off */
export const CMAKE_CONFIGURE_FLAGS = ['-DENABLE_WALLET=OFF', '-DENABLE_IPC=OFF'];

export class CMakeStrategy extends CommandSequenceStrategy {
  readonly system = BuildSystem.CMake;

  binaryDir(sourceDir: string): string {
    return join(sourceDir, CMAKE_BUILD_DIR, 'bin');
  }

  steps(context: BuildContext): BuildStep[] {
    return [
      {
        label: 'Configuring (wallet support disabled for node-only build)',
        spec: this.command(context, 'cmake', ['-B', CMAKE_BUILD_DIR, ...CMAKE_CONFIGURE_FLAGS])
      },
      {
        label: `Compiling with ${context.jobs} jobs`,
        spec: this.command(context, 'cmake', ['--build', CMAKE_BUILD_DIR, `-j${context.jobs}`])
      }
    ];
  }
}
