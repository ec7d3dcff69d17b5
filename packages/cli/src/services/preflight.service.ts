/**
 * Preflight: make sure the external tools a deployment shells out to exist,
 * installing them through the host package manager when possible.
 */

import { ToolMissingError } from '../errors';
import { createCommandLogger } from '../logger';
import type { CommandRunner } from '../types';

const logger = createCommandLogger('preflight');

export type PackageManager = 'apt-get' | 'yum' | 'brew';

export interface InstallCommand {
  command: string;
  args: string[];
}

export interface Installer {
  manager: PackageManager;
  commands: InstallCommand[];
}

export interface ToolRequirement {
  name: string;
  /** Tried in order; an installer is skipped when its package manager is absent */
  installers: Installer[];
  manualInstall: string;
}

export const REQUIRED_TOOLS: ToolRequirement[] = [
  {
    name: 'gcloud',
    installers: [
      {
        manager: 'apt-get',
        commands: [
          { command: 'sudo', args: ['apt-get', 'update'] },
          { command: 'sudo', args: ['apt-get', 'install', '-y', 'google-cloud-cli'] },
        ],
      },
      {
        manager: 'yum',
        commands: [{ command: 'sudo', args: ['yum', 'install', '-y', 'google-cloud-cli'] }],
      },
      {
        manager: 'brew',
        commands: [{ command: 'brew', args: ['install', '--cask', 'google-cloud-sdk'] }],
      },
    ],
    manualInstall: 'Install the Google Cloud CLI from https://cloud.google.com/sdk/docs/install',
  },
];

export type ToolStatus = 'present' | 'installed';

export interface PreflightResult {
  tools: { name: string; status: ToolStatus; installedWith?: PackageManager }[];
}

export interface PreflightOptions {
  tools?: ToolRequirement[];
  onLog?: (message: string) => void;
}

export async function isCommandAvailable(runner: CommandRunner, command: string): Promise<boolean> {
  const result = await runner.run('which', [command]);
  return result.exitCode === 0;
}

async function runInstaller(runner: CommandRunner, installer: Installer): Promise<boolean> {
  for (const step of installer.commands) {
    const result = await runner.run(step.command, step.args);
    if (result.exitCode !== 0) {
      logger.warn(`${step.command} ${step.args.join(' ')} exited with ${result.exitCode}`, {
        stderr: result.stderr.trim(),
      });
      return false;
    }
  }
  return true;
}

/**
 * Ensure one tool is on PATH. Throws ToolMissingError when every installer fails.
 */
export async function ensureTool(
  runner: CommandRunner,
  tool: ToolRequirement,
  onLog: (message: string) => void = console.log
): Promise<{ status: ToolStatus; installedWith?: PackageManager }> {
  if (await isCommandAvailable(runner, tool.name)) {
    return { status: 'present' };
  }

  onLog(`${tool.name} is not installed. Attempting to install...`);

  for (const installer of tool.installers) {
    if (!(await isCommandAvailable(runner, installer.manager))) {
      continue;
    }

    onLog(`Installing ${tool.name} with ${installer.manager}...`);
    const ran = await runInstaller(runner, installer);

    if (ran && (await isCommandAvailable(runner, tool.name))) {
      logger.info(`Installed ${tool.name} with ${installer.manager}`);
      return { status: 'installed', installedWith: installer.manager };
    }
  }

  throw new ToolMissingError(tool.name, tool.manualInstall);
}

/**
 * Check every required tool, in order
 */
export async function runPreflight(
  runner: CommandRunner,
  options: PreflightOptions = {}
): Promise<PreflightResult> {
  const { tools = REQUIRED_TOOLS, onLog = console.log } = options;
  const result: PreflightResult = { tools: [] };

  for (const tool of tools) {
    const outcome = await ensureTool(runner, tool, onLog);
    result.tools.push({ name: tool.name, ...outcome });
  }

  return result;
}
