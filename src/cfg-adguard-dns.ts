import { Command } from 'commander';

import { type CommandRunner, runCommand } from './command-runner.ts';
import { type CfgAdguardDnsConfig, loadConfig } from './config.ts';
import { HELP_MESSAGE, UNKNOWN_ARGUMENT_MESSAGE } from './constants.ts';
import { CfgAdguardDnsError } from './errors.ts';
import { type HeadFile, openHeadFile } from './resolv-conf-head.ts';
import { activateAdguardDns, deactivateAdguardDns } from './resolvconf.ts';
import { showStatus } from './status.ts';

type CfgAdguardDnsOptions = {
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
};

const dispatch = async (
  verb: string | undefined,
  headFile: HeadFile,
  config: CfgAdguardDnsConfig,
  runner: CommandRunner
): Promise<void> => {
  switch (verb) {
    case undefined:
    case '--help':
      console.log(HELP_MESSAGE);
      return;
    case '--activate':
    case 'activate':
      await activateAdguardDns(headFile, config, runner);
      return;
    case '--deactivate':
    case 'deactivate':
      await deactivateAdguardDns(headFile, config, runner);
      return;
    case '--status':
    case 'status':
      showStatus(config, runner);
      return;
    default:
      console.error(UNKNOWN_ARGUMENT_MESSAGE);
  }
};

/**
 * The head file is truncated before the verb is looked at, so `--help` and
 * unknown arguments also leave it empty. The usage disclaimer announces this.
 */
const runCfgAdguardDns = async (
  verb: string | undefined,
  { env = process.env, runner = runCommand }: CfgAdguardDnsOptions = {}
): Promise<void> => {
  const config = loadConfig(env);
  const headFile = await openHeadFile(config.headPath);

  try {
    await dispatch(verb, headFile, config, runner);
  } finally {
    await headFile.close();
  }
};

// Verbs double as flags (`--status` and `status`), and commander would still
// swallow a leading `--`. Its option parsing and help are switched off and the
// verb is taken from the user arguments exactly as given.
const buildProgram = (
  userArgs: readonly string[],
  options: CfgAdguardDnsOptions = {}
): Command => {
  const program = new Command();
  program.name('cfg-adguard-dns');
  program.helpOption(false);
  program.allowUnknownOption();
  program.allowExcessArguments();
  program.argument('[verb]');

  program.action(() => runCfgAdguardDns(userArgs[0], options));

  return program;
};

const formatError = (error: CfgAdguardDnsError): string =>
  error.cause instanceof Error
    ? `${error.message}: ${error.cause.message}`
    : error.message;

/**
 * Runs the CLI against `userArgs` (the arguments after the program name) and
 * resolves to the process exit code. Errors other than `CfgAdguardDnsError`
 * propagate.
 */
const main = async (
  userArgs: readonly string[],
  options: CfgAdguardDnsOptions = {}
): Promise<number> => {
  try {
    await buildProgram(userArgs, options).parseAsync([...userArgs], {
      from: 'user'
    });
    return 0;
  } catch (e) {
    if (e instanceof CfgAdguardDnsError) {
      console.error(formatError(e));
      return 1;
    }
    throw e;
  }
};

export { type CfgAdguardDnsOptions, runCfgAdguardDns, buildProgram, main };
