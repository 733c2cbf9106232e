import child_process from 'child_process';

import { CommandSpawnError } from './errors.ts';

type CommandResult = {
  status: number | null;
  stdout: Buffer;
  stderr: Buffer;
};

/**
 * Runs a command to completion and captures its output as raw bytes.
 * Throws `CommandSpawnError` carrying `failureMessage` when the process cannot
 * be started; a non-zero exit status is returned, not thrown.
 */
type CommandRunner = (
  command: string,
  args: readonly string[],
  failureMessage: string
) => CommandResult;

const runCommand: CommandRunner = (command, args, failureMessage) => {
  const result = child_process.spawnSync(command, args);

  if (result.error) {
    throw new CommandSpawnError(failureMessage, command, args, result.error);
  }

  return {
    status: result.status,
    stdout: result.stdout,
    stderr: result.stderr
  };
};

export { type CommandResult, type CommandRunner, runCommand };
