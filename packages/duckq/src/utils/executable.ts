/**
 * Executable discovery on the search path.
 */

import { accessSync, constants, statSync } from 'node:fs';
import { delimiter, isAbsolute, join, sep } from 'node:path';

/**
 * Answers whether a program can be launched by name.
 */
export interface ExecutableLocator {
  exists(name: string): boolean;
}

export interface PathExecutableLocatorOptions {
  /**
   * Search path to scan.
   * @default process.env.PATH
   */
  path?: string | undefined;

  /**
   * Extensions tried on Windows.
   * @default process.env.PATHEXT
   */
  pathExt?: string | undefined;

  /**
   * @default process.platform
   */
  platform?: NodeJS.Platform;
}

function isExecutableFile(candidate: string, platform: NodeJS.Platform): boolean {
  try {
    if (!statSync(candidate).isFile()) {
      return false;
    }
    // Windows has no execute bit; existence is what counts there.
    if (platform !== 'win32') {
      accessSync(candidate, constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}

/**
 * Looks programs up the way a shell would: every `PATH` entry in order, plus
 * each `PATHEXT` suffix on Windows. Names that already contain a path
 * separator are checked directly.
 */
export class PathExecutableLocator implements ExecutableLocator {
  private readonly directories: string[];
  private readonly extensions: string[];
  private readonly platform: NodeJS.Platform;

  constructor(options: PathExecutableLocatorOptions = {}) {
    this.platform = options.platform ?? process.platform;
    const path = 'path' in options ? options.path : process.env['PATH'];
    const pathExt = 'pathExt' in options ? options.pathExt : process.env['PATHEXT'];

    this.directories = (path ?? '').split(delimiter).filter(dir => dir !== '');
    this.extensions =
      this.platform === 'win32'
        ? ['', ...(pathExt ?? '.EXE;.CMD;.BAT;.COM').split(';').filter(ext => ext !== '')]
        : [''];
  }

  exists(name: string): boolean {
    if (name === '') {
      return false;
    }

    const candidates =
      isAbsolute(name) || name.includes(sep) || name.includes('/')
        ? [name]
        : this.directories.map(dir => join(dir, name));

    return candidates.some(candidate =>
      this.extensions.some(ext => isExecutableFile(candidate + ext, this.platform))
    );
  }
}
