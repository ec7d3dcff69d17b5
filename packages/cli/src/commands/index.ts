/**
 * searchdeploy CLI commands
 */

export { createProgram, interruptMessage, runDeploy } from './deploy';
export type { DeployCommandOptions, DeployDependencies } from './deploy';
