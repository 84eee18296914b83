/**
 * CLI action handlers.
 * Each action handles a specific CLI command and reports an exit code.
 */

export { createDefaultContext, type ActionContext } from './context.js';
export { handleOpenAction, type OpenActionOptions } from './open.js';
export { handleProfilesAction } from './profiles.js';
