/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { Command, Option } from 'commander';
import { loadConfig, type LoadedConfig } from '../config.js';
import { enableDebugLog } from '../utils/debugLog.js';
import { runKeysCommand, runSizeCommand } from './commands.js';

interface SessionFlags {
  config?: string;
  driver?: LoadedConfig['driver'];
  signals?: boolean;
}

async function resolveConfig(flags: SessionFlags): Promise<LoadedConfig> {
  const config = await loadConfig(flags.config);
  if (config.debug) {
    enableDebugLog();
  }
  return {
    ...config,
    driver: flags.driver ?? config.driver,
    signalPassthrough: flags.signals ?? config.signalPassthrough,
  };
}

function addSessionOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'path to a config file')
    .addOption(new Option('-d, --driver <kind>', 'terminal driver').choices(['auto', 'stty', 'raw-mode']))
    .option('-s, --signals', 'let Ctrl-C and Ctrl-\\ raise signals instead of arriving as bytes');
}

export function createProgram(version: string): Command {
  const program = new Command();

  program
    .name('rawterm')
    .description('Inspect raw terminal input and size')
    .version(version, '-v, --version', 'output the current version');

  addSessionOptions(program.command('keys'))
    .description('print every byte read from the terminal until q is pressed')
    .action(async (flags: SessionFlags) => {
      await runKeysCommand({ config: await resolveConfig(flags) });
    });

  addSessionOptions(program.command('size'))
    .description('print the terminal size in rows x columns')
    .option('-w, --watch', 'keep printing the size when the window is resized')
    .action(async (flags: SessionFlags & { watch?: boolean }) => {
      await runSizeCommand({ config: await resolveConfig(flags) }, { watch: flags.watch });
    });

  return program;
}
