import { describe, it, expect } from 'vitest';
import { ToolMissingError } from '../errors';
import { runPreflight } from '../services/preflight.service';
import { FakeRunner, captureLines } from './fakes';

describe('runPreflight', () => {
  it('should only check for gcloud when it is installed', async () => {
    const runner = new FakeRunner();

    const result = await runPreflight(runner, { onLog: () => {} });

    expect(result).toEqual({ tools: [{ name: 'gcloud', status: 'present' }] });
    expect(runner.lines()).toEqual(['which gcloud']);
  });

  it('should install gcloud with apt-get when available', async () => {
    const runner = new FakeRunner().on('which gcloud', { exitCode: 1 }, 1);
    const log = captureLines();

    const result = await runPreflight(runner, { onLog: log.write });

    expect(result.tools).toEqual([{ name: 'gcloud', status: 'installed', installedWith: 'apt-get' }]);
    expect(runner.lines()).toEqual([
      'which gcloud',
      'which apt-get',
      'sudo apt-get update',
      'sudo apt-get install -y google-cloud-cli',
      'which gcloud',
    ]);
    expect(log.lines).toEqual([
      'gcloud is not installed. Attempting to install...',
      'Installing gcloud with apt-get...',
    ]);
  });

  it('should skip package managers that are not present', async () => {
    const runner = new FakeRunner()
      .on('which gcloud', { exitCode: 1 }, 1)
      .on('which apt-get', { exitCode: 1 })
      .on('which yum', { exitCode: 1 });

    const result = await runPreflight(runner, { onLog: () => {} });

    expect(result.tools[0]).toEqual({ name: 'gcloud', status: 'installed', installedWith: 'brew' });
    expect(runner.lines()).toContain('brew install --cask google-cloud-sdk');
    expect(runner.lines()).not.toContain('sudo yum install -y google-cloud-cli');
  });

  it('should move on when an installer fails', async () => {
    const runner = new FakeRunner()
      .on('which gcloud', { exitCode: 1 })
      .on('sudo apt-get update', { exitCode: 100, stderr: 'E: Could not get lock' })
      .on('which yum', { exitCode: 1 })
      .on('which brew', { exitCode: 1 });

    await expect(runPreflight(runner, { onLog: () => {} })).rejects.toBeInstanceOf(ToolMissingError);
    expect(runner.lines()).not.toContain('sudo apt-get install -y google-cloud-cli');
  });

  it('should name the tool and the manual install when nothing works', async () => {
    const runner = new FakeRunner().on('which', { exitCode: 1 });

    const error = await runPreflight(runner, { onLog: () => {} }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolMissingError);
    if (error instanceof ToolMissingError) {
      expect(error.tool).toBe('gcloud');
      expect(error.message).toBe('Could not install gcloud. Please install it manually and try again.');
      expect(error.remediation).toBe(
        'Install the Google Cloud CLI from https://cloud.google.com/sdk/docs/install'
      );
    }
    expect(runner.lines()).toEqual(['which gcloud', 'which apt-get', 'which yum', 'which brew']);
  });
});
