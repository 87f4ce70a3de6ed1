/**
 * 指令共用工具
 * Global option parsing and error exits shared by the commands
 */

import type { Command } from 'commander';
import { getConfigService, type ConfigService } from '../services/config.js';
import { parseFormat, type OutputFormat } from './output.js';

export interface GlobalOptions {
  format: OutputFormat;
  config?: string;
}

export function globalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals();
  const config: unknown = opts.config;
  return {
    format: parseFormat(opts.format),
    ...(typeof config === 'string' && config ? { config } : {}),
  };
}

/**
 * 依 --config 取得設定服務
 */
export function configFor(cmd: Command): ConfigService {
  return getConfigService(globalOptions(cmd).config);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Print an error and exit with the usage/input error code
 */
export function fail(message: string): never {
  console.error(`❌ ${message}`);
  process.exit(1);
}
