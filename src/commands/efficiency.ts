/**
 * @file efficiency.ts - Efficiency command
 * @description Aggregates a flight log into a speed-bucketed energy-per-distance table
 * @depends commander, runner, schemas, efficiency-aggregator, logger
 */

import { Command } from 'commander';
import { EfficiencyCliOptionsSchema } from '../core/schemas';
import { EfficiencyAggregator } from '../converters/efficiency-aggregator';
import { Logger } from '../utils/logger';
import {
  loadProjectConfig,
  parseOptions,
  resolvePaths,
  runConversion,
  type CommandContext,
} from './runner';

export function createEfficiencyCommand(context: CommandContext): Command {
  const command = new Command('efficiency');

  command
    .description('Aggregate a flight log into an efficiency table (Wh/km per speed)')
    .requiredOption('--input <path>', 'Path to raw flight log CSV')
    .requiredOption('--name <label>', 'Name suffix for outputs (e.g., xwing_indi)')
    .option('--outdir <path>', 'Output directory (default: data)')
    .option('--bins <number>', 'Number of equal-width speed bins (default: one bucket per speed value)')
    .option('--verbose', 'Report every rejected row')
    .action((rawOptions: unknown) => {
      const options = parseOptions(EfficiencyCliOptionsSchema, rawOptions);
      Logger.setVerbose(options.verbose);
      const config = loadProjectConfig(context);
      const paths = resolvePaths(context, config, options);

      runConversion(`Efficiency ${options.name}`, () =>
        new EfficiencyAggregator().convert({
          ...paths,
          name: options.name,
          bins: options.bins ?? config.efficiency.bins ?? undefined,
          aliases: config.aliases,
        })
      );
    });

  return command;
}
