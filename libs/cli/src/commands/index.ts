/**
 * CLI Commands
 *
 * Exports all command creator functions for registration in the main CLI.
 */

export { createDeployCommand } from './deploy';
export { createCheckCommand } from './check';
export { createDiagnoseCommand } from './diagnose';
export { createProfileCommand } from './profile';
export { createConfigureCommand } from './configure';
