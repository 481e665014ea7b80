/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 *
 * Global test setup:
 * - Disables chalk colours so CLI output can be asserted verbatim
 * - Clears RAWTERM_* variables inherited from the developer's shell
 */
import chalk from 'chalk';

chalk.level = 0;

for (const key of Object.keys(process.env)) {
  if (key.startsWith('RAWTERM_')) {
    delete process.env[key];
  }
}
