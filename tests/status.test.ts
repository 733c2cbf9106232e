import { afterEach, describe, expect, it, vi } from 'vitest';

import type { CommandRunner } from '../src/command-runner.ts';
import { loadConfig } from '../src/config.ts';
import { CommandSpawnError } from '../src/errors.ts';
import { classifyLookupOutput, showStatus } from '../src/status.ts';

const lookupOutput = (address: string) =>
  Buffer.from(
    [
      'Server:\t\t127.0.0.53',
      'Address:\t127.0.0.53#53',
      '',
      'Non-authoritative answer:',
      'Name:\twikipedia.org',
      `Address: ${address}`,
      ''
    ].join('\n')
  );

const runnerReturning = (stdout: Buffer) =>
  vi.fn<CommandRunner>(() => ({
    status: 0,
    stdout,
    stderr: Buffer.alloc(0)
  }));

const config = loadConfig({ RESOLVCONF_HEAD_PATH: '/tmp/head' });

afterEach(() => {
  vi.restoreAllMocks();
});

describe('classifyLookupOutput', () => {
  it('reports activated for the first AdGuard address', () => {
    expect(classifyLookupOutput(lookupOutput('94.140.14.14'))).toEqual({
      decoded: true,
      status: 'activated'
    });
  });

  it('reports activated for the second AdGuard address', () => {
    expect(classifyLookupOutput(lookupOutput('94.149.15.15'))).toEqual({
      decoded: true,
      status: 'activated'
    });
  });

  it('reports deactivated when neither address appears', () => {
    expect(classifyLookupOutput(lookupOutput('198.51.100.7'))).toEqual({
      decoded: true,
      status: 'deactivated'
    });
  });

  it('reports deactivated for empty output', () => {
    expect(classifyLookupOutput(Buffer.alloc(0))).toEqual({
      decoded: true,
      status: 'deactivated'
    });
  });

  it('refuses output that is not valid UTF-8', () => {
    expect(classifyLookupOutput(Buffer.from([0xff, 0xfe, 0x39, 0x34]))).toEqual(
      { decoded: false }
    );
  });
});

describe('showStatus', () => {
  it('looks up wikipedia.org with nslookup', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const runner = runnerReturning(lookupOutput('198.51.100.7'));

    showStatus(config, runner);

    expect(runner).toHaveBeenCalledWith(
      'nslookup',
      ['wikipedia.org'],
      'failed to execute nslookup'
    );
  });

  it('prints the activated line', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    showStatus(config, runnerReturning(lookupOutput('94.140.14.14')));

    expect(log).toHaveBeenCalledWith('ADGUARD DNS is activated');
  });

  it('prints the deactivated line', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    showStatus(config, runnerReturning(lookupOutput('198.51.100.7')));

    expect(log).toHaveBeenCalledWith('ADGUARD DNS is deactivated');
  });

  it('prints the lookup error and no status for undecodable output', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const result = showStatus(config, runnerReturning(Buffer.from([0xc3])));

    expect(result).toEqual({ decoded: false });
    expect(error).toHaveBeenCalledWith(
      'nslookup is not installed or could not lookup wikipedia.org'
    );
    expect(log).not.toHaveBeenCalled();
  });

  it('lets spawn failures through', () => {
    const runner = vi.fn<CommandRunner>(() => {
      throw new CommandSpawnError(
        'failed to execute nslookup',
        'nslookup',
        ['wikipedia.org'],
        new Error('spawnSync nslookup ENOENT')
      );
    });

    expect(() => showStatus(config, runner)).toThrow(
      'failed to execute nslookup'
    );
  });
});
