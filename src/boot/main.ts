/**
 * Fault monitor entry point
 */

import * as fs from 'node:fs';

import chalk from 'chalk';
import * as dotenv from 'dotenv';

import { describeError } from '@logging';
import { createCommandQueue, runLoop } from '@system/control';
import { now, sleep } from '@utils/time';

import { applyCliOptions, createProgram, readCliOptions } from './cli';
import { loadConfig } from './config';
import { exitCodeFor, initialize } from './init';
import { attachKeyboard } from './keyboard';

async function main(argv: string[]): Promise<number> {
  dotenv.config();

  const program = createProgram();
  program.parse(argv);

  const loaded = loadConfig(process.env);
  if (loaded.errors.length > 0) {
    console.error(chalk.red('INIT FAIL: Invalid environment'));
    loaded.errors.forEach(function(message) {
      console.error('  ' + message);
    });
    return 1;
  }

  const config = applyCliOptions(loaded.config, readCliOptions(program.opts()));
  const system = initialize(config, {
    consoleApi: console,
    fs: fs,
    timeSource: now,
    random: Math.random,
    sleep: sleep
  });
  if (system === null) return 1;

  console.log(chalk.bold('Debugging & Fault Simulation System'));
  console.log(chalk.gray('Commands: f (inject fault), r (attempt recovery), d (debug info), q (quit)'));

  const commands = createCommandQueue();
  const detach = attachKeyboard(process.stdin, commands);
  try {
    await runLoop({
      monitor: system.monitor,
      commands: commands,
      random: Math.random,
      sleep: sleep,
      print: function(line) { console.log(line); },
      config: config
    });
  } finally {
    detach();
  }

  const result = system.monitor.shutdown();
  if (result.ok) {
    const report = result.value;
    console.log(chalk.gray(
      'Session: ' + report.flushedEntries + ' entries written, ' +
      report.evictedEntries + ' evicted, ' + report.droppedFaults + ' faults not recorded'
    ));
  } else {
    console.error(chalk.red('Shutdown: ' + result.error.message));
  }
  console.log('System shutdown complete.');

  return exitCodeFor(result);
}

main(process.argv).then(
  function(code) {
    process.exitCode = code;
  },
  function(error: unknown) {
    console.error(chalk.red('Fatal: ' + describeError(error)));
    process.exitCode = 1;
  }
);
