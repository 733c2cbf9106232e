import boxen from 'boxen';

import type { CommandRunner } from './command-runner.ts';
import type { CfgAdguardDnsConfig } from './config.ts';
import { RESOLVCONF_FAILURE_MESSAGE } from './constants.ts';
import {
  type AdguardDnsState,
  type HeadFile,
  writeHeadTemplate
} from './resolv-conf-head.ts';

const updateResolvconf = (
  config: CfgAdguardDnsConfig,
  runner: CommandRunner
): void => {
  runner(
    config.reloadCommand,
    config.reloadArgs,
    RESOLVCONF_FAILURE_MESSAGE
  );
};

const applyAdguardDnsState = async (
  headFile: HeadFile,
  state: AdguardDnsState,
  config: CfgAdguardDnsConfig,
  runner: CommandRunner
): Promise<void> => {
  console.log(
    boxen(
      state === 'activated'
        ? 'Activating AdGuard DNS'
        : 'Deactivating AdGuard DNS',
      {
        padding: 1,
        borderStyle: 'double'
      }
    )
  );

  await writeHeadTemplate(headFile, state);
  updateResolvconf(config, runner);

  console.log(
    `Wrote ${config.headPath} and ran ${[
      config.reloadCommand,
      ...config.reloadArgs
    ].join(' ')}`
  );
};

const activateAdguardDns = (
  headFile: HeadFile,
  config: CfgAdguardDnsConfig,
  runner: CommandRunner
): Promise<void> => applyAdguardDnsState(headFile, 'activated', config, runner);

const deactivateAdguardDns = (
  headFile: HeadFile,
  config: CfgAdguardDnsConfig,
  runner: CommandRunner
): Promise<void> =>
  applyAdguardDnsState(headFile, 'deactivated', config, runner);

export { updateResolvconf, activateAdguardDns, deactivateAdguardDns };
