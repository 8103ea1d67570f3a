/**
 * @file runner.ts - Shared plumbing for converter commands
 * @description Option validation, configuration lookup and the per-run status spinner
 * @depends ora, zod, path, logger, project-config-manager
 */

import * as path from 'path';
import ora from 'ora';
import type { z } from 'zod';
import { formatZodError, type ProjectConfig } from '../core/schemas';
import type { WrittenFile } from '../types';
import { Logger } from '../utils/logger';
import { ProjectConfigManager } from '../utils/project-config-manager';

export interface CommandContext {
  /** Directory relative paths and plotdata.config.json are resolved against */
  cwd: string;
}

/** Bad command-line input that commander itself does not catch */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.infer<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new UsageError(`Invalid option: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

export interface ResolvedPaths {
  input: string;
  outdir: string;
}

/** Command-line outdir wins over the configured one; both are relative to the working directory */
export function resolvePaths(
  context: CommandContext,
  config: ProjectConfig,
  options: { input: string; outdir?: string }
): ResolvedPaths {
  return {
    input: path.resolve(context.cwd, options.input),
    outdir: path.resolve(context.cwd, options.outdir ?? config.outdir),
  };
}

export function loadProjectConfig(context: CommandContext): ProjectConfig {
  return new ProjectConfigManager(context.cwd).load();
}

/**
 * Run one conversion under a status spinner and list what was written
 * @throws Whatever the conversion throws, after marking the spinner as failed
 */
export function runConversion(label: string, convert: () => WrittenFile[]): WrittenFile[] {
  const spinner = ora(`${label}...`).start();
  let written: WrittenFile[];
  try {
    written = convert();
  } catch (error) {
    spinner.fail(`${label} failed`);
    throw error;
  }

  spinner.succeed(`${label}: wrote ${written.length} file(s)`);
  for (const file of written) {
    Logger.info(`${file.path} (${file.rows} row${file.rows === 1 ? '' : 's'})`);
  }
  return written;
}
