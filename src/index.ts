#!/usr/bin/env node
/**
 * runtune: run-history-driven parameter tuning for automation agents.
 *
 * Entry point: commander-based CLI with subcommands.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from './config/config.js';
import { createApp, type AppDeps } from './bootstrap.js';
import { runRecord } from './commands/record.js';
import { runTune, formatReport } from './commands/tune.js';
import { listParams, getParam, setParam, resetParams } from './commands/params.js';
import { listMetrics } from './commands/metrics.js';
import { collectAssignment, parseAgentType, parseNumber, parsePositiveInt } from './commands/parse.js';
import type { AgentType } from './params/catalog.js';
import * as log from './utils/logger.js';

const require = createRequire(import.meta.url);
const { version } = require('../package.json');

interface GlobalOptions {
  debug?: boolean;
  config?: string;
}

const program = new Command();

program
  .name('runtune')
  .description('Tune agent timeouts and retry counts from recorded run outcomes')
  .version(version)
  .option('-d, --debug', 'Enable debug logging')
  .option('-c, --config <path>', 'Config file (default: ./runtune.json)');

async function withApp<T>(fn: (app: AppDeps) => Promise<T>): Promise<T> {
  const opts = program.opts<GlobalOptions>();
  const config = await loadConfig({ path: opts.config });
  log.setLogLevel(opts.debug ? 'debug' : config.log.level);

  const app = await createApp(config);
  try {
    return await fn(app);
  } finally {
    app.close();
  }
}

program
  .command('record <agentType>')
  .description('Record the outcome counts of one finished run, then tune that agent type')
  .option('--count <name=n>', 'Outcome count, repeatable (e.g. scroll_failure=3)', collectAssignment)
  .option('--rate <name=r>', 'Precomputed rate in [0,1], repeatable', collectAssignment)
  .option('-f, --file <path>', 'JSON file with counts and derivedRates')
  .option('--no-tune', 'Only record, do not tune')
  .action(async (agentTypeArg: string, opts: { count?: Array<[string, number]>; rate?: Array<[string, number]>; file?: string; tune: boolean }) => {
    const agentType = parseAgentType(agentTypeArg);
    await withApp(async app => {
      const result = await runRecord(app, agentType, {
        counts: opts.count,
        rates: opts.rate,
        file: opts.file,
        tune: opts.tune,
      });
      console.log(`Recorded ${agentType} run ${result.metric.id}`);
      if (result.report) console.log(formatReport(result.report).join('\n'));
    });
  });

program
  .command('tune [agentType]')
  .description('Apply the tuning rules to one agent type, or to all of them')
  .action(async (agentTypeArg?: string) => {
    const agentType = agentTypeArg ? parseAgentType(agentTypeArg) : undefined;
    await withApp(async app => {
      for (const report of await runTune(app, agentType)) {
        console.log(formatReport(report).join('\n'));
      }
    });
  });

const params = program
  .command('params')
  .description('Inspect or edit the current run parameters');

params
  .command('list [agentType]')
  .description('List parameters with bounds')
  .action(async (agentTypeArg?: string) => {
    const agentType: AgentType | undefined = agentTypeArg ? parseAgentType(agentTypeArg) : undefined;
    await withApp(async app => {
      console.log(listParams(app, agentType).join('\n'));
    });
  });

params
  .command('get <key>')
  .description('Print one parameter, e.g. outreach_agent.scroll_wait')
  .action(async (key: string) => {
    await withApp(async app => {
      console.log(getParam(app, key));
    });
  });

params
  .command('set <key> <value>')
  .description('Set one parameter (clamped to its bounds)')
  .action(async (key: string, valueArg: string) => {
    const value = parseNumber(valueArg);
    await withApp(async app => {
      const { stored, clamped } = await setParam(app, key, value);
      console.log(clamped ? chalk.yellow(`${key} = ${stored} (clamped from ${value})`) : `${key} = ${stored}`);
    });
  });

params
  .command('reset [agentType]')
  .description('Restore built-in defaults')
  .action(async (agentTypeArg?: string) => {
    const agentType = agentTypeArg ? parseAgentType(agentTypeArg) : undefined;
    await withApp(async app => {
      await resetParams(app, agentType);
      console.log(`Reset ${agentType ?? 'all agent types'} to defaults`);
    });
  });

program
  .command('metrics <agentType>')
  .description('Show the most recent recorded runs')
  .option('-n, --limit <n>', 'Number of runs', parsePositiveInt, 10)
  .action(async (agentTypeArg: string, opts: { limit: number }) => {
    const agentType = parseAgentType(agentTypeArg);
    await withApp(async app => {
      console.log((await listMetrics(app, agentType, opts.limit)).join('\n'));
    });
  });

program.parseAsync().catch((err) => {
  console.error('Fatal:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
