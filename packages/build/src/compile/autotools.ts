/**
 * @fileoverview Autotools pipeline for node daemon releases before the CMake switch
 */

import { join } from 'path';
import { BuildSystem } from '../types';
import { CommandSequenceStrategy, type BuildContext, type BuildStep } from './strategy';

/** Node-only build: no wallet, no GUI */
export const AUTOTOOLS_CONFIGURE_FLAGS = ['--disable-wallet', '--disable-gui'];

export class AutotoolsStrategy extends CommandSequenceStrategy {
  readonly system = BuildSystem.Autotools;

  binaryDir(sourceDir: string): string {
    return join(sourceDir, 'bin');
  }

  steps(context: BuildContext): BuildStep[] {
    return [
      { label: 'Running autogen.sh', spec: this.command(context, './autogen.sh', []) },
      {
        label: 'Configuring (wallet support disabled for node-only build)',
        spec: this.command(context, './configure', AUTOTOOLS_CONFIGURE_FLAGS)
      },
      { label: `Compiling with ${context.jobs} jobs`, spec: this.command(context, 'make', [`-j${context.jobs}`]) }
    ];
  }
}
