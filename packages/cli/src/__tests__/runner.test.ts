import { describe, it, expect } from 'vitest';
import { ExecFileRunner, diagnosticsOf } from '../gcp/runner';

// Runs the current node binary so the checks need nothing else installed
const NODE = process.execPath;

describe('ExecFileRunner', () => {
  it('should return stdout of a successful command', async () => {
    const result = await new ExecFileRunner().run(NODE, ['-e', 'process.stdout.write("ok")']);

    expect(result).toEqual({ exitCode: 0, stdout: 'ok', stderr: '' });
  });

  it('should resolve with the exit code and stderr of a failing command', async () => {
    const result = await new ExecFileRunner().run(NODE, [
      '-e',
      'process.stderr.write("oops\\n"); process.exit(3)',
    ]);

    expect(result).toEqual({ exitCode: 3, stdout: '', stderr: 'oops\n' });
    expect(diagnosticsOf(result)).toBe('oops');
  });

  it('should map a missing binary to 127 and keep the spawn error', async () => {
    const result = await new ExecFileRunner().run('searchdeploy-missing-binary', ['a']);

    expect(result.exitCode).toBe(127);
    expect(result.stdout).toBe('');
    expect(result.stderr).toContain('ENOENT');
  });

  it('should pass arguments through without a shell', async () => {
    const result = await new ExecFileRunner().run(NODE, [
      '-e',
      'process.stdout.write(process.argv[1])',
      '$HOME; echo nope',
    ]);

    expect(result.stdout).toBe('$HOME; echo nope');
  });
});
