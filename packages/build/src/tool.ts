/**
 * Tool Invocation
 *
 * Runs one external tool and turns every way it can fail into a
 * CommandExecutionError carrying the tool's exit code and error text.
 */

import {
  formatCommandLine,
  SPAWN_FAILURE_EXIT_CODE,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
} from '@fileclassify/utils';
import { CommandExecutionError, errorMessage } from '@fileclassify/core';

export async function runTool(
  runner: CommandRunner,
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const commandLine = formatCommandLine(command, args);

  let result: CommandResult;
  try {
    result = await runner(command, args, options);
  } catch (error) {
    throw new CommandExecutionError(commandLine, SPAWN_FAILURE_EXIT_CODE, errorMessage(error));
  }

  if (result.timedOut) {
    throw new CommandExecutionError(
      commandLine,
      result.exitCode === 0 ? 1 : result.exitCode,
      `timed out after ${options.timeout ?? 0}ms\n${result.stderr}`
    );
  }

  if (result.exitCode !== 0) {
    throw new CommandExecutionError(commandLine, result.exitCode, result.stderr || result.stdout);
  }

  return result;
}
