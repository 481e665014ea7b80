/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect, vi } from 'vitest';
import { TerminalResizeWatcher } from '../../src/terminal/resizeWatcher.js';
import { queryWindowSize } from '../../src/terminal/drivers/windowSize.js';
import { FakeTtyOutput } from '../helpers/fakeTerminal.js';

describe('TerminalResizeWatcher', () => {
  const sourceFor = (output: FakeTtyOutput) => ({ querySize: () => queryWindowSize(output) });

  it('reports the new size on each resize event', () => {
    const output = new FakeTtyOutput(80, 24);
    const handler = vi.fn();

    const watcher = new TerminalResizeWatcher(output, sourceFor(output), handler);
    output.resize(100, 30);
    output.resize(60, 20);

    expect(handler.mock.calls).toEqual([[{ rows: 30, columns: 100 }], [{ rows: 20, columns: 60 }]]);
    watcher.dispose();
  });

  it('stops reacting once disposed', () => {
    const output = new FakeTtyOutput();
    const handler = vi.fn();

    const watcher = new TerminalResizeWatcher(output, sourceFor(output), handler);
    watcher.dispose();
    watcher.dispose();
    output.resize(100, 30);

    expect(handler).not.toHaveBeenCalled();
    expect(output.listenerCount('resize')).toBe(0);
  });

  it('accepts an output without resize events', () => {
    const handler = vi.fn();
    const output = { isTTY: true, getWindowSize: (): [number, number] => [80, 24] };

    const watcher = new TerminalResizeWatcher(output, { querySize: () => queryWindowSize(output) }, handler);

    expect(() => watcher.dispose()).not.toThrow();
  });
});
