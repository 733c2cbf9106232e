import { isUtf8 } from 'buffer';

import type { CommandRunner } from './command-runner.ts';
import type { CfgAdguardDnsConfig } from './config.ts';
import {
  DNS_SERVER_1_ADDR,
  DNS_SERVER_2_ADDR,
  LOOKUP_ERROR_MESSAGE,
  NSLOOKUP_FAILURE_MESSAGE,
  STATUS_ACTIVATED_MESSAGE,
  STATUS_DEACTIVATED_MESSAGE
} from './constants.ts';
import type { AdguardDnsState } from './resolv-conf-head.ts';

type LookupClassification =
  | { decoded: true; status: AdguardDnsState }
  | { decoded: false };

const containsAdguardDnsServer = (output: string): boolean =>
  output.includes(DNS_SERVER_1_ADDR) || output.includes(DNS_SERVER_2_ADDR);

const classifyLookupOutput = (stdout: Buffer): LookupClassification => {
  if (!isUtf8(stdout)) {
    return { decoded: false };
  }

  return {
    decoded: true,
    status: containsAdguardDnsServer(stdout.toString('utf-8'))
      ? 'activated'
      : 'deactivated'
  };
};

/**
 * Infers the current state from a live lookup through the system resolver.
 * The head file is never read here, so the answer can lag behind it.
 */
const showStatus = (
  config: CfgAdguardDnsConfig,
  runner: CommandRunner
): LookupClassification => {
  const { stdout } = runner(
    config.lookupCommand,
    [config.lookupTarget],
    NSLOOKUP_FAILURE_MESSAGE
  );
  const classification = classifyLookupOutput(stdout);

  if (!classification.decoded) {
    console.error(LOOKUP_ERROR_MESSAGE);
  } else if (classification.status === 'activated') {
    console.log(STATUS_ACTIVATED_MESSAGE);
  } else {
    console.log(STATUS_DEACTIVATED_MESSAGE);
  }

  return classification;
};

export {
  type LookupClassification,
  containsAdguardDnsServer,
  classifyLookupOutput,
  showStatus
};
