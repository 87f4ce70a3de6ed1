import { Command } from 'commander';
import { harvestCommand } from './commands/harvest.js';
import { sitesCommand } from './commands/sites.js';
import { crawlCommand } from './commands/crawl.js';
import { pageCommand } from './commands/page.js';
import { pdfCommand } from './commands/pdf.js';
import { geocodeCommand } from './commands/geocode.js';
import { cacheCommand } from './commands/cache.js';
import { diffCommand } from './commands/diff.js';
import { configCommand } from './commands/config.js';
import { configureLoggers } from './lib/logger.js';
import { configFor } from './utils/command.js';

export const cli = new Command();

cli
  .name('fc-stops')
  .description('Harvest transit stops and routes from the transport-fc carrier sites')
  .version('0.1.0');

// 全域選項
cli
  .option('-f, --format <format>', 'output format: json (default) | table | csv', 'json')
  .option('-c, --config <path>', 'config file path');

// 日誌一律輸出到 stderr，stdout 只留給指令結果
cli.hook('preAction', (_thisCommand, actionCommand) => {
  configureLoggers({
    minLevel: configFor(actionCommand).getLogLevel(),
    stderr: true,
  });
});

// 註冊指令
cli.addCommand(harvestCommand);
cli.addCommand(sitesCommand);
cli.addCommand(crawlCommand);
cli.addCommand(pageCommand);
cli.addCommand(pdfCommand);
cli.addCommand(geocodeCommand);
cli.addCommand(cacheCommand);
cli.addCommand(diffCommand);
cli.addCommand(configCommand);
