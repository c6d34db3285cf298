/**
 * CLI commands index
 * Exports all command creators
 */

export { createTargetsCommand } from './targets.js';
export { createGenerateCommand } from './generate.js';
export { createStageCommand } from './stage.js';
export { createConfigCommand } from './config.js';
export { getGlobalOptions, loadCommandContext, writeRunLog } from './shared.js';
export type { CommandContext, GlobalOptions } from './shared.js';
