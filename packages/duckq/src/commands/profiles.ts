import { promises as fs } from 'node:fs';
import { fileExists } from '../utils/fs.js';

export interface ListProfilesOptions {
  /** AWS shared config file (`[default]`, `[profile NAME]` sections) */
  configFile: string;
  /** AWS shared credentials file (`[NAME]` sections) */
  credentialsFile: string;
}

const SECTION_PATTERN = /^\[\s*([^\]]*?)\s*\]/;

/**
 * Extracts profile names from the section headers of an AWS shared file.
 *
 * In the config file profiles are `[profile NAME]` (except `[default]`) and
 * other sections such as `[sso-session x]` are skipped; in the credentials
 * file every section is a profile.
 */
export function parseProfileNames(content: string, kind: 'config' | 'credentials'): string[] {
  const names: string[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const match = SECTION_PATTERN.exec(rawLine.trim());
    const section = match?.[1];
    if (section === undefined || section === '') {
      continue;
    }

    if (kind === 'credentials' || section === 'default') {
      names.push(section);
      continue;
    }

    const profile = /^profile\s+(.+)$/.exec(section)?.[1];
    if (profile !== undefined) {
      names.push(profile.trim());
    }
  }

  return names;
}

async function readProfiles(path: string, kind: 'config' | 'credentials'): Promise<string[]> {
  if (!(await fileExists(path))) {
    return [];
  }
  return parseProfileNames(await fs.readFile(path, 'utf-8'), kind);
}

/**
 * Lists the AWS profiles a `--profile` flag can name, sorted and de-duplicated.
 * Missing files contribute nothing.
 */
export async function listProfiles(options: ListProfilesOptions): Promise<string[]> {
  const [fromConfig, fromCredentials] = await Promise.all([
    readProfiles(options.configFile, 'config'),
    readProfiles(options.credentialsFile, 'credentials'),
  ]);

  return [...new Set([...fromConfig, ...fromCredentials])].sort((a, b) => a.localeCompare(b));
}
