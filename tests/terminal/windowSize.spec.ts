/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect } from 'vitest';
import { TerminalIoError } from '../../src/terminal/errors.js';
import { queryWindowSize } from '../../src/terminal/drivers/windowSize.js';
import { FakeTtyOutput } from '../helpers/fakeTerminal.js';

describe('queryWindowSize', () => {
  it('maps getWindowSize() columns/rows onto rows/columns', () => {
    expect(queryWindowSize(new FakeTtyOutput(100, 40))).toEqual({ rows: 40, columns: 100 });
  });

  it('reflects a size change on the next call', () => {
    const output = new FakeTtyOutput(80, 24);

    queryWindowSize(output);
    output.columns = 90;
    const size = queryWindowSize(output);

    expect(size.columns).toBe(90);
    expect(output.getWindowSize).toHaveBeenCalledTimes(2);
  });

  it('fails for a zero-column terminal', () => {
    expect(() => queryWindowSize(new FakeTtyOutput(0, 24))).toThrow(
      'Terminal reported an unusable width of 0 columns'
    );
  });

  it('fails for a zero-row terminal', () => {
    expect(() => queryWindowSize(new FakeTtyOutput(80, 0))).toThrow(TerminalIoError);
  });

  it('fails when the output is not a TTY', () => {
    const output = new FakeTtyOutput();
    output.isTTY = false;

    expect(() => queryWindowSize(output)).toThrow('Cannot query terminal size: output is not a TTY');
  });

  it('wraps errors from the size query', () => {
    const output = new FakeTtyOutput();
    output.getWindowSize.mockImplementation(() => {
      throw new Error('EBADF');
    });

    try {
      queryWindowSize(output);
      expect.unreachable('queryWindowSize should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(TerminalIoError);
      expect((error as TerminalIoError).operation).toBe('size');
      expect((error as TerminalIoError).message).toBe('Failed to query terminal size: EBADF');
    }
  });
});
