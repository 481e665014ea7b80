#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
process.title = 'rawterm';
import chalk from 'chalk';
import fs from 'fs-extra';
import { fileURLToPath } from 'node:url';
import { createProgram } from './cli/program.js';
import { TerminalAccessError } from './terminal/errors.js';

function readVersion(): string {
  // src/index.ts and dist/index.js both sit one level below package.json
  const packagePath = fileURLToPath(new URL('../package.json', import.meta.url));
  try {
    const pkg: unknown = fs.readJsonSync(packagePath);
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // fall through to the placeholder
  }
  return '0.0.0';
}

try {
  await createProgram(readVersion()).parseAsync(process.argv);
} catch (error) {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(message));
  if (error instanceof TerminalAccessError && error.step === 'restore') {
    console.error(chalk.yellow('The terminal may still be in raw mode. Run `reset` or `stty sane` to recover.'));
  }
  process.exitCode = 1;
}
