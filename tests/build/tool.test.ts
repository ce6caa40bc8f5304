import { describe, it, expect } from 'vitest';
import { runTool } from '@fileclassify/build';
import { CommandExecutionError } from '@fileclassify/core';
import { executeCommand } from '@fileclassify/utils';

const node = process.execPath;

describe('runTool with real processes', () => {
  it('should carry a non-zero exit code and the tool error text', async () => {
    const failure = runTool(executeCommand, node, ['-e', "process.stderr.write('no such package'); process.exit(3)"]);

    await expect(failure).rejects.toBeInstanceOf(CommandExecutionError);
    await expect(failure).rejects.toMatchObject({ exitCode: 3 });
    await expect(failure).rejects.toThrow('no such package');
  });

  it('should report a missing tool as exit code 127', async () => {
    await expect(runTool(executeCommand, 'fileclassify-missing-tool', ['--version'])).rejects.toMatchObject({
      exitCode: 127,
    });
  });

  it('should turn a timeout into a failure', async () => {
    const failure = runTool(executeCommand, node, ['-e', 'setTimeout(() => {}, 20000)'], { timeout: 200 });

    await expect(failure).rejects.toMatchObject({ exitCode: 128 });
    await expect(failure).rejects.toThrow('timed out after 200ms');
  });

  it('should resolve with the captured output on success', async () => {
    const result = await runTool(executeCommand, node, ['-e', "process.stdout.write('ok')"]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe('ok');
  });
});
