/**
 * Confirmation gate shown before anything is changed in GCP
 */

import { imageUri, serviceAccountEmail } from '../config';
import { describeRegion } from '../regions';
import { ConfirmationDeclinedError, NotInteractiveError } from '../errors';
import { createCommandLogger } from '../logger';
import type { DeploymentConfig } from '../types';
import { PROVISIONING_STEPS } from './provision.service';

const logger = createCommandLogger('confirm');

export type Ask = (message: string) => Promise<string>;

export type GateDecision = 'skipped' | 'confirmed';

export interface ConfirmationOptions {
  ask?: Ask;
  /** Whether an operator can answer the prompt; defaults to stdin being a TTY */
  isInteractive?: () => boolean;
}

export function stdinIsInteractive(): boolean {
  return process.stdin.isTTY === true;
}

/**
 * Prompt through inquirer; the reply is returned verbatim
 */
export async function askWithInquirer(message: string): Promise<string> {
  const inquirer = await import('inquirer');
  const { reply } = await inquirer.default.prompt<{ reply: string }>([
    {
      type: 'input',
      name: 'reply',
      message,
    },
  ]);
  return reply;
}

/**
 * Lines describing what a run is about to do
 */
export function describePlan(config: DeploymentConfig): string[] {
  const lines = [
    `Project ID: ${config.projectId}`,
    `Region: ${describeRegion(config.region)}`,
    `Location: ${config.location}`,
    `Data Store ID: ${config.dataStoreId}`,
    `Application Name: ${config.appName}`,
    `Service Account: ${serviceAccountEmail(config)}`,
    `Image: ${imageUri(config)}`,
    '',
    'This will:',
  ];

  const actions = [
    ...PROVISIONING_STEPS.map((step) => step.title),
    'Build and push the container image',
    'Deploy the application to Cloud Run',
  ];
  actions.forEach((action, i) => lines.push(`${i + 1}. ${action}`));

  return lines;
}

function isAffirmative(reply: string): boolean {
  return /^[Yy]$/.test(reply.trim());
}

/**
 * Resolves when the run may proceed; throws ConfirmationDeclinedError when the
 * operator says no and NotInteractiveError when nobody can be asked
 */
export async function confirmDeployment(
  config: DeploymentConfig,
  options: ConfirmationOptions = {}
): Promise<GateDecision> {
  if (config.skipConfirmation) {
    logger.info('Confirmation skipped');
    return 'skipped';
  }

  const isInteractive = options.isInteractive ?? stdinIsInteractive;
  if (!isInteractive()) {
    logger.warn('No terminal to prompt on');
    throw new NotInteractiveError();
  }

  const ask = options.ask ?? askWithInquirer;
  const reply = await ask('Continue? (y/n)');

  if (!isAffirmative(reply)) {
    logger.info('Operator declined', { reply });
    throw new ConfirmationDeclinedError();
  }

  return 'confirmed';
}
