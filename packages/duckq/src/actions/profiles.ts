/**
 * CLI action handler for the profiles command.
 */

import { listProfiles } from '../commands/profiles.js';
import { loadConfig } from '../config.js';
import { toError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { ActionContext } from './context.js';

/**
 * Handles the profiles CLI command.
 * Prints the AWS profiles available to `--profile`.
 *
 * @returns The exit code for the process
 */
export async function handleProfilesAction(context: ActionContext): Promise<number> {
  try {
    const config = loadConfig(context.env);
    const logger = createLogger({
      level: config.logLevel,
      timestamps: config.logTimestamps,
      stdout: context.stdout,
      stderr: context.stderr,
    });

    const profiles = await listProfiles({
      configFile: config.awsConfigFile,
      credentialsFile: config.awsCredentialsFile,
    });

    if (profiles.length === 0) {
      logger.info(`No AWS profiles found in ${config.awsConfigFile} or ${config.awsCredentialsFile}.`);
      return 0;
    }

    logger.section('AWS profiles');
    logger.list(profiles);
    return 0;
  } catch (error) {
    context.stderr(`Error: ${toError(error).message}`);
    return 1;
  }
}
