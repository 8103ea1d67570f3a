/**
 * @file init.ts - Initialize command
 * @description Writes a default plotdata.config.json in the working directory
 * @depends commander, project-config-manager, logger
 */

import { Command } from 'commander';
import { InitCliOptionsSchema } from '../core/schemas';
import { Logger } from '../utils/logger';
import { ProjectConfigManager } from '../utils/project-config-manager';
import { parseOptions, type CommandContext } from './runner';

export function createInitCommand(context: CommandContext): Command {
  const command = new Command('init');

  command
    .description('Create plotdata.config.json with default settings')
    .option('--force', 'Overwrite an existing configuration file')
    .action((rawOptions: unknown) => {
      const { force } = parseOptions(InitCliOptionsSchema, rawOptions);
      const manager = new ProjectConfigManager(context.cwd);
      const configPath = manager.getConfigPath();

      if (!manager.writeDefault(force)) {
        Logger.info(`Configuration file already exists: ${configPath} (use --force to overwrite)`);
        return;
      }

      Logger.success(`Created config file: ${configPath}`);
      Logger.info('');
      Logger.info('Settings:');
      Logger.info('  outdir: Output directory for all converters (default: data)');
      Logger.info('  thrustmap.aggregate: Average rows sharing a throttle/rpm value');
      Logger.info('  efficiency.bins: Equal-width speed bins, null for one bucket per speed');
      Logger.info('  aliases: Extra header names per column, e.g. { "thrust_N": ["Thrust (N)"] }');
    });

  return command;
}
