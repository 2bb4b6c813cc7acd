/**
 * n8n-setup commands
 */

export { createSetupCommand } from './setup';
export { createStatusCommand } from './status';
export { createLogsCommand } from './logs';
export { createServicesCommand } from './services';
export type { CommandDeps } from './context';
