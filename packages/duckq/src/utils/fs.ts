/**
 * File system utilities.
 */

import { promises as fs } from 'node:fs';

/**
 * Checks if a file or directory exists at the given path.
 * Non-throwing alternative to fs.access().
 *
 * @example
 * ```ts
 * if (await fileExists(configFile)) {
 *   const content = await fs.readFile(configFile, 'utf-8');
 * }
 * ```
 */
export async function fileExists(path: string): Promise<boolean> {
  return fs.access(path).then(() => true).catch(() => false);
}
