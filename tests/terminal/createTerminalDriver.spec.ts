/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect } from 'vitest';
import {
  RawModeDriver,
  SttyDriver,
  createTerminalDriver,
  resolveDriverKind,
} from '../../src/terminal/drivers/index.js';
import { FakeTtyInput, FakeTtyOutput } from '../helpers/fakeTerminal.js';

describe('resolveDriverKind', () => {
  it.each([
    ['auto', 'linux', 'stty'],
    ['auto', 'darwin', 'stty'],
    ['auto', 'win32', 'raw-mode'],
    ['raw-mode', 'linux', 'raw-mode'],
    ['stty', 'win32', 'stty'],
  ] as const)('%s on %s picks %s', (preference, platform, expected) => {
    expect(resolveDriverKind(preference, platform)).toBe(expected);
  });
});

describe('createTerminalDriver', () => {
  const io = () => ({ input: new FakeTtyInput(), output: new FakeTtyOutput() });

  it('builds the stty driver on POSIX', () => {
    const driver = createTerminalDriver('auto', { io: io(), platform: 'linux' });

    expect(driver).toBeInstanceOf(SttyDriver);
    expect(driver.kind).toBe('stty');
  });

  it('builds the raw-mode driver on Windows', () => {
    const driver = createTerminalDriver('auto', { io: io(), platform: 'win32' });

    expect(driver).toBeInstanceOf(RawModeDriver);
    expect(driver.kind).toBe('raw-mode');
  });

  it('routes stty calls through the injected runner', () => {
    const calls: string[][] = [];
    const driver = createTerminalDriver('stty', {
      io: io(),
      stty: (args) => {
        calls.push([...args]);
        return 'saved\n';
      },
    });

    expect(driver.captureMode()).toBe('saved');
    expect(calls).toEqual([['-g']]);
  });
});
