import inquirer from 'inquirer';
import chalk from 'chalk';
import boxen from 'boxen';
import Table from 'cli-table3';
import gradient from 'gradient-string';
import ora from 'ora';
import path from 'path';
import { CliOptions } from './cliArgs.js';
import { AppConfig } from './env.js';
import { describeSpreadsheet, LabelGenerator } from './labelGenerator.js';
import { loadSpreadsheetFile, SUPPORTED_EXTENSIONS } from './spreadsheetLoader.js';
import { GroupDiagnostic, LayoutVariant, TabularData } from './types.js';

const VARIANT_NAMES: Record<LayoutVariant, string> = {
  v1: 'Multiple Parts (v1)',
  v2: 'Single Part (v2)'
};

export class PartLabelCli {
  private config: AppConfig;
  private generator: LabelGenerator;

  constructor(config: AppConfig, outputDir?: string) {
    this.config = config;
    this.generator = new LabelGenerator(outputDir ? path.resolve(outputDir) : config.outputDir);
  }

  private showBanner(): void {
    const title = gradient.pastel.multiline([
      '╔═══════════════════════════════════════════════╗',
      '║                                               ║',
      '║     RACK LABEL GENERATOR                      ║',
      '║     Part / Description / Location sheets      ║',
      '║                                               ║',
      '╚═══════════════════════════════════════════════╝'
    ].join('\n'));

    console.log('\n' + title + '\n');
  }

  private async promptFilePath(): Promise<string> {
    const { filePath } = await inquirer.prompt<{ filePath: string }>([
      {
        type: 'input',
        name: 'filePath',
        message: chalk.bold('Path to the Excel or CSV file:'),
        prefix: '📄',
        filter: (input: string) => input.trim().replace(/^["']|["']$/g, ''),
        validate: (input: string) => {
          const extension = path.extname(input.trim()).toLowerCase();
          return SUPPORTED_EXTENSIONS.includes(extension) || `Expected one of ${SUPPORTED_EXTENSIONS.join(', ')}`;
        }
      }
    ]);
    return filePath;
  }

  private async promptVariant(): Promise<LayoutVariant> {
    const { variant } = await inquirer.prompt<{ variant: LayoutVariant }>([
      {
        type: 'list',
        name: 'variant',
        message: chalk.bold('Choose label type:'),
        choices: [
          { name: `${chalk.cyan(VARIANT_NAMES.v1)} - up to two parts per location`, value: 'v1' },
          { name: `${chalk.magenta(VARIANT_NAMES.v2)} - one large part per location`, value: 'v2' }
        ],
        default: this.config.defaultVariant,
        prefix: '🏷️'
      }
    ]);
    return variant;
  }

  private showFileInfo(table: TabularData): void {
    const summary = describeSpreadsheet(table);

    const infoTable = new Table({
      style: { head: ['cyan'], border: ['grey'] },
      head: summary.columns.map(column => chalk.bold(column))
    });
    for (const row of summary.sample) {
      infoTable.push(summary.columns.map(column => row[column] ?? ''));
    }

    console.log(chalk.bold('\n📊 File information'));
    console.log(chalk.dim(`  Columns found: ${summary.columns.join(', ') || '(none)'}`));
    if (summary.sample.length > 0) {
      console.log(infoTable.toString());
    }
    console.log('');
  }

  private showSkipped(skipped: GroupDiagnostic[]): void {
    if (skipped.length === 0) {
      return;
    }
    const skippedTable = new Table({
      style: { head: ['yellow'], border: ['grey'] },
      head: ['#', 'Location', 'Reason']
    });
    for (const diagnostic of skipped) {
      skippedTable.push([String(diagnostic.index + 1), diagnostic.locationKey || chalk.dim('(blank)'), diagnostic.reason]);
    }
    console.log(chalk.yellow.bold(`\n⚠️  Skipped ${skipped.length} location(s):`));
    console.log(skippedTable.toString());
  }

  async run(options: CliOptions): Promise<boolean> {
    this.showBanner();

    const filePath = options.filePath ?? (await this.promptFilePath());

    const spinner = ora({ text: `Reading ${path.basename(filePath)}...`, color: 'cyan' }).start();
    let table: TabularData;
    try {
      table = await loadSpreadsheetFile(filePath);
    } catch (error) {
      spinner.fail(chalk.red(`Could not load ${path.basename(filePath)}`));
      throw error;
    }
    spinner.succeed(chalk.green(`File loaded: ${table.rows.length} rows and ${table.columns.length} columns`));

    this.showFileInfo(table);

    const variant = options.variant ?? (await this.promptVariant());
    const generation = ora({ text: 'Laying out labels...', color: 'cyan' }).start();

    const generated = await this.generator.generate(table, variant, (index, total, locationKey, diagnostic) => {
      if (!diagnostic) {
        generation.text = `Processing location ${index + 1}/${total}: ${locationKey}`;
      }
    });
    const { result } = generated;

    if (result.columns) {
      generation.info(
        chalk.dim(
          `Using columns: Part No: ${result.columns.partNumber}, Description: ${result.columns.description}, Location: ${result.columns.location}`
        )
      );
    }

    const outputPath = await this.generator.save(generated);
    this.showSkipped(result.skipped);

    if (!outputPath) {
      console.log(boxen(
        chalk.red.bold('❌ No labels were generated.') +
          '\n\n' +
          chalk.white('Check that the file has Part No, Description and Location columns.'),
        { padding: 1, margin: { top: 1, bottom: 1 }, borderStyle: 'round', borderColor: 'red' }
      ));
      return false;
    }

    console.log(boxen(
      `${chalk.bold.white(VARIANT_NAMES[variant])}\n\n` +
        `${chalk.cyan('Labels:')}    ${result.blockCount}\n` +
        `${chalk.cyan('Pages:')}     ${generated.pageCount}\n` +
        `${chalk.cyan('Locations:')} ${result.groupCount}` +
        (result.skipped.length > 0 ? chalk.yellow(` (${result.skipped.length} skipped)`) : '') +
        `\n\n${chalk.green(outputPath)}`,
      {
        padding: 1,
        margin: { top: 1, bottom: 1 },
        borderStyle: 'double',
        borderColor: 'green',
        title: chalk.bold.green('PDF READY'),
        titleAlignment: 'center'
      }
    ));
    return true;
  }
}

export function printHelp(): void {
  console.log(`
Usage:
  part-labels [file] [options]

Arguments:
  file                 Excel (.xlsx) or CSV file with part number, description and location columns

Options:
  -v, --variant <v1|v2>
                       v1: multiple parts per location (two stacked parts)
                       v2: single part per location (large type)
  -o, --out <dir>      Output directory (default: LABEL_OUTPUT_DIR or ./labels)
  -h, --help           Show this help menu

Prompts for the file and label type when they are not given.
`.trim());
  console.log('');
}
