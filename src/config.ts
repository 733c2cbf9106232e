import {
  NSLOOKUP_COMMAND,
  NSLOOKUP_TARGET,
  RESOLVCONF_COMMAND,
  RESOLVCONF_HEAD_DEFAULT_PATH,
  RESOLVCONF_HEAD_ENV_VAR,
  RESOLVCONF_UPDATE_ARGS
} from './constants.ts';

type CfgAdguardDnsConfig = {
  headPath: string;
  reloadCommand: string;
  reloadArgs: readonly string[];
  lookupCommand: string;
  lookupTarget: string;
};

// An empty override still counts as set.
const resolveHeadPath = (env: NodeJS.ProcessEnv = process.env): string => {
  const value = env[RESOLVCONF_HEAD_ENV_VAR];
  return value === undefined ? RESOLVCONF_HEAD_DEFAULT_PATH : value;
};

const loadConfig = (
  env: NodeJS.ProcessEnv = process.env
): CfgAdguardDnsConfig => ({
  headPath: resolveHeadPath(env),
  reloadCommand: RESOLVCONF_COMMAND,
  reloadArgs: RESOLVCONF_UPDATE_ARGS,
  lookupCommand: NSLOOKUP_COMMAND,
  lookupTarget: NSLOOKUP_TARGET
});

export { type CfgAdguardDnsConfig, resolveHeadPath, loadConfig };
