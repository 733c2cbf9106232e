#!/usr/bin/env tsx
/**
 * Usage: sudo cfg-adguard-dns [options...]
 *
 * Options:
 *   --activate      Activate AdGuard DNS server
 *   --deactivate    Deactivate AdGuard DNS server
 *   --status        Shows wether AdGuard DNS server is activated or not
 *   --help          Display the current help message
 *
 * Set RESOLVCONF_HEAD_PATH to write somewhere other than
 * /etc/resolvconf/resolv.conf.d/head.
 */

import { main } from '../src/cfg-adguard-dns.ts';

process.exitCode = await main(process.argv.slice(2));
