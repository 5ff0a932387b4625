/**
 * Tests for the configuration check
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { Mock } from 'vitest';

import type { ConsoleAPI } from '@logging';
import { checkConfig } from './check-config';
import { loadProcessSettings } from './config';

describe('checkConfig', () => {
  let dir: string;
  let path: string;
  let log: Mock<ConsoleAPI['log']>;
  let warn: Mock<ConsoleAPI['warn']>;

  function run(): boolean {
    return checkConfig(loadProcessSettings({ FERMENT_CONFIG_PATH: path }), { log: log, warn: warn });
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ferment-check-'));
    path = join(dir, 'fermentation.json');
    log = vi.fn<ConsoleAPI['log']>();
    warn = vi.fn<ConsoleAPI['warn']>();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should accept a valid file and print the effective config', () => {
    writeFileSync(path, JSON.stringify({ heatingPlug: '192.168.1.50', coolingPlug: '192.168.1.51', lowLimit: 64 }));

    expect(run()).toBe(true);
    expect(log.mock.calls[0]).toEqual(['✅ ' + path + ' is valid']);
    expect(JSON.parse(log.mock.calls[1]?.[0] ?? '')).toMatchObject({ lowLimit: 64, highLimit: 68, coolingPlug: '192.168.1.51' });
    expect(warn).not.toHaveBeenCalled();
  });

  it('should print warnings for an accepted file', () => {
    writeFileSync(path, JSON.stringify({ controlEnabled: true, coolingPlug: '192.168.1.51', brewName: 'stout' }));

    expect(run()).toBe(true);
    expect(warn.mock.calls).toEqual([
      ['⚠️ Unknown setting "brewName" ignored'],
      ['⚠️ heating is enabled but heatingPlug is not set']
    ]);
  });

  it('should list every problem of a rejected file', () => {
    writeFileSync(path, JSON.stringify({ lowLimit: 'cold', unit: 'K' }));

    expect(run()).toBe(false);
    expect(warn.mock.calls).toEqual([
      ['❌ ' + path + ' is invalid'],
      ['  - lowLimit must be a number'],
      ['  - unit must be "F" or "C"']
    ]);
    expect(log).not.toHaveBeenCalled();
  });

  it('should report unreadable JSON', () => {
    writeFileSync(path, 'not json');

    expect(run()).toBe(false);
    expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^ {2}- Cannot load configuration from /));
  });
});
