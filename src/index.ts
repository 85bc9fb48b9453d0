#!/usr/bin/env node

import chalk from 'chalk';
import { PartLabelCli, printHelp } from './cli.js';
import { CliUsageError, parseCliArgs } from './cliArgs.js';
import { loadDotEnv, resolveConfig } from './env.js';

async function main(argv: string[]): Promise<number> {
  const options = parseCliArgs(argv);
  if (options.help) {
    printHelp();
    return 0;
  }

  await loadDotEnv();
  const cli = new PartLabelCli(resolveConfig(), options.outputDir);
  return (await cli.run(options)) ? 0 : 1;
}

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    if (error instanceof CliUsageError) {
      console.log(chalk.red(error.message));
      printHelp();
    } else {
      console.error(chalk.red.bold('\n❌ Fatal error:'), error instanceof Error ? error.message : error);
    }
    process.exit(1);
  });
