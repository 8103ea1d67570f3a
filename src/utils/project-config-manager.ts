/**
 * @file project-config-manager.ts - Project configuration manager
 * @description Loads and creates plotdata.config.json in the working directory. Values here
 * sit between the built-in defaults and command-line options.
 * @depends fs, path, zod, schemas, logger
 */

import * as fs from 'fs';
import * as path from 'path';
import { ProjectConfigSchema, formatZodError, type ProjectConfig } from '../core/schemas';
import { Logger } from './logger';

export const CONFIG_FILE_NAME = 'plotdata.config.json';

export class ProjectConfigError extends Error {
  constructor(configPath: string, message: string) {
    super(`${configPath}: ${message}`);
    this.name = 'ProjectConfigError';
  }
}

export class ProjectConfigManager {
  private config: ProjectConfig | null = null;

  constructor(private readonly directory: string) {}

  getConfigPath(): string {
    return path.join(this.directory, CONFIG_FILE_NAME);
  }

  exists(): boolean {
    return fs.existsSync(this.getConfigPath());
  }

  /**
   * Read and validate the configuration; built-in defaults when no file exists
   * @throws {ProjectConfigError} When the file is not valid JSON or fails validation
   */
  load(): ProjectConfig {
    if (this.config) {
      return this.config;
    }

    const configPath = this.getConfigPath();
    if (!fs.existsSync(configPath)) {
      Logger.debug(`Config file not found: ${configPath}, using defaults`);
      this.config = ProjectConfigSchema.parse({});
      return this.config;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProjectConfigError(configPath, `invalid JSON (${reason})`);
    }

    const parsed = ProjectConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProjectConfigError(configPath, formatZodError(parsed.error));
    }

    Logger.debug(`Loaded config: ${configPath}`);
    this.config = parsed.data;
    return this.config;
  }

  /**
   * Write the default configuration
   * @sideeffect Overwrites an existing file only when `force` is set
   * @returns Whether a file was written
   */
  writeDefault(force = false): boolean {
    const configPath = this.getConfigPath();
    if (this.exists() && !force) {
      return false;
    }

    const defaults = ProjectConfigSchema.parse({});
    fs.writeFileSync(configPath, JSON.stringify(defaults, null, 2) + '\n', 'utf-8');
    this.config = null;
    return true;
  }
}
