const RESOLVCONF_HEAD_ENV_VAR = 'RESOLVCONF_HEAD_PATH';
const RESOLVCONF_HEAD_DEFAULT_PATH = '/etc/resolvconf/resolv.conf.d/head';

const DEFAULT_TEMPLATE = `
# Dynamic resolv.conf(5) file for glibc resolver(3) generated by resolvconf(8)
#     DO NOT EDIT THIS FILE BY HAND -- YOUR CHANGES WILL BE OVERWRITTEN
# 127.0.0.53 is the systemd-resolved stub resolver.
# run "systemd-resolve --status" to see details about the actual nameservers.
`;

const DNS_SERVER_1_ADDR = '94.140.14.14';
const DNS_SERVER_2_ADDR = '94.149.15.15';

// Trailing space after "AdGuard DNS" is part of the installed file.
const ADGUARD_DNS_SERVER_CONFIG = `
# AdGuard DNS 
# https://adguard-dns.com/en/public-dns.html
nameserver ${DNS_SERVER_1_ADDR}
nameserver ${DNS_SERVER_2_ADDR}
`;

const HELP_MESSAGE = `
Usage: sudo cfg-adguard-dns [options...]

        --activate      Activate AdGuard DNS server 
        --deactivate    Deactivate AdGuard DNS server 
        --status        Shows wether AdGuard DNS server is activated or not
        --help          Display the current help message

Disclaimer: Using this tool will restore the ${RESOLVCONF_HEAD_DEFAULT_PATH} file to its default state.
`;

const UNKNOWN_ARGUMENT_MESSAGE =
  'Unknown argument. Try `cfg-adguard-dns --help` for more information';

const STATUS_ACTIVATED_MESSAGE = 'ADGUARD DNS is activated';
const STATUS_DEACTIVATED_MESSAGE = 'ADGUARD DNS is deactivated';

const RESOLVCONF_COMMAND = 'resolvconf';
const RESOLVCONF_UPDATE_ARGS = ['-u'];
const RESOLVCONF_FAILURE_MESSAGE = 'failed to update resolvconf';

const NSLOOKUP_COMMAND = 'nslookup';
const NSLOOKUP_TARGET = 'wikipedia.org';
const NSLOOKUP_FAILURE_MESSAGE = `failed to execute ${NSLOOKUP_COMMAND}`;

const LOOKUP_ERROR_MESSAGE = `${NSLOOKUP_COMMAND} is not installed or could not lookup ${NSLOOKUP_TARGET}`;

export {
  RESOLVCONF_HEAD_ENV_VAR,
  RESOLVCONF_HEAD_DEFAULT_PATH,
  DEFAULT_TEMPLATE,
  DNS_SERVER_1_ADDR,
  DNS_SERVER_2_ADDR,
  ADGUARD_DNS_SERVER_CONFIG,
  HELP_MESSAGE,
  UNKNOWN_ARGUMENT_MESSAGE,
  STATUS_ACTIVATED_MESSAGE,
  STATUS_DEACTIVATED_MESSAGE,
  RESOLVCONF_COMMAND,
  RESOLVCONF_UPDATE_ARGS,
  RESOLVCONF_FAILURE_MESSAGE,
  NSLOOKUP_COMMAND,
  NSLOOKUP_TARGET,
  NSLOOKUP_FAILURE_MESSAGE,
  LOOKUP_ERROR_MESSAGE
};
