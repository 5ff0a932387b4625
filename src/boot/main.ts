#!/usr/bin/env tsx
import { Command } from 'commander';

import { checkConfig } from './check-config';
import { loadEnvironment } from './config';
import { initialize, VERSION } from './init';
import { errorMessage } from '$types/errors';
import { createControlLoop, runTick } from '@system/control';
import { createNodeTimer } from '@utils/time';

import type { Runtime } from './types';

interface GlobalOptions {
  env?: string;
}

const program = new Command();

program
  .name('fermentation-controller')
  .description('Hold a fermenter between two temperature limits with heating and cooling plugs')
  .version(VERSION)
  .option('-e, --env <file>', 'read environment from this .env file');

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

async function start(): Promise<Runtime> {
  const runtime = await initialize(loadEnvironment(globalOptions().env));
  if (runtime === null) {
    throw new Error('Startup aborted');
  }
  return runtime;
}

/**
 * Let queued plug commands finish and write out buffered logs
 */
async function drain(runtime: Runtime): Promise<void> {
  await runtime.controller.channel.idle();
  runtime.flushLogs();
}

program
  .command('run', { isDefault: true })
  .description('run the control loop until interrupted')
  .action(async function() {
    const runtime = await start();
    const controller = runtime.controller;

    // First tick now, then every updateIntervalSec of the reloaded config
    const loop = createControlLoop(controller, createNodeTimer({ keepAlive: true }));
    loop.start();

    function stop(signal: string): void {
      loop.stop();
      controller.logger.info('🛑 ' + signal + ' received, stopping');
      drain(runtime).then(function() {
        process.exit(0);
      }, function(err: unknown) {
        console.error(errorMessage(err));
        process.exit(1);
      });
    }

    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
  });

program
  .command('tick')
  .description('run a single control tick and exit')
  .action(async function() {
    const runtime = await start();
    const status = runTick(runtime.controller);
    await drain(runtime);
    if (status === null) {
      process.exitCode = 1;
    }
  });

program
  .command('check-config')
  .description('validate the configuration file and print the effective settings')
  .action(function() {
    const ok = checkConfig(loadEnvironment(globalOptions().env), console);
    if (!ok) {
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch(function(err: unknown) {
  console.error(errorMessage(err));
  process.exitCode = 1;
});
