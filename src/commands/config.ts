/**
 * Config Command
 * 設定檢視指令
 */

import { Command } from 'commander';
import { configFor, globalOptions } from '../utils/command.js';
import { output, type ColumnDef } from '../utils/output.js';

interface SettingRow {
  key: string;
  value: string;
}

const COLUMNS: ColumnDef<SettingRow>[] = [
  { key: 'key', label: 'Key' },
  { key: 'value', label: 'Value' },
];

export const configCommand = new Command('config')
  .description('Inspect the effective configuration');

/**
 * fc-stops config show
 */
configCommand
  .command('show')
  .description('Show effective settings (environment over config file over defaults)')
  .action((_options: unknown, cmd: Command) => {
    const { format } = globalOptions(cmd);
    const settings = configFor(cmd).getSettings();

    if (format === 'json') {
      console.log(JSON.stringify(settings, null, 2));
      return;
    }

    const rows = Object.entries(settings).map(([key, value]) => ({ key, value: String(value) }));
    console.log(output(rows, COLUMNS, format));
  });

/**
 * fc-stops config path
 */
configCommand
  .command('path')
  .description('Print the config file location')
  .action((_options: unknown, cmd: Command) => {
    console.log(configFor(cmd).getConfigPath());
  });
