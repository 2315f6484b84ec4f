#!/usr/bin/env node

/**
 * CLI Helper for Dialog Detection
 *
 * Classifies saved uiautomator dumps against every dialog shape and shows
 * which target roles the locator resolves. Useful when a new application
 * version changes its dialogs and the UI variants need updating.
 */

import fs from 'fs/promises';
import path from 'path';
import { program } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { loadUiVariants, type UiVariants } from '../../backend/src/config/uiVariants';
import { analyzeDump, countNodes, type DumpAnalysis } from '../../backend/src/services/detector/dumpAnalysis';
import { logger } from '../../backend/src/services/logger';
import { parseUiHierarchy } from '../../backend/src/utils/uiHierarchy';

interface CLIOptions {
  verbose: boolean;
  output?: string;
  variants?: string;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

async function collectXmlFiles(xmlPath: string): Promise<string[]> {
  const stat = await fs.stat(xmlPath);
  if (stat.isFile()) {
    return [xmlPath];
  }
  if (stat.isDirectory()) {
    const files = await fs.readdir(xmlPath);
    return files
      .filter(file => file.endsWith('.xml'))
      .sort()
      .map(file => path.join(xmlPath, file));
  }
  throw new Error('Invalid path: must be a file or directory');
}

export function renderAnalysis(analysis: DumpAnalysis, verbose: boolean): string {
  const shapes = new Table({
    head: ['Shape', 'Score', 'Status', 'Signals'],
    colWidths: [22, 9, 12, 48],
    wordWrap: true
  });

  for (const report of analysis.reports) {
    const status = report.confirmed ? chalk.green('CONFIRMED') : chalk.gray('no');
    const signals = report.signals.map(signal => `${signal.name}(+${signal.weight})`);
    if (report.missingRequired.length > 0) {
      signals.push(chalk.red(`missing: ${report.missingRequired.join(', ')}`));
    }
    shapes.push([report.shape, `${report.score}/${report.threshold}`, status, signals.join(' ') || '-']);
  }

  const roles = new Table({
    head: ['Role', 'Strategy', 'Caption', 'Class'],
    colWidths: [22, 12, 28, 30],
    wordWrap: true
  });

  for (const role of analysis.roles) {
    roles.push(
      role.found
        ? [role.role, role.strategy ?? '-', role.caption ?? '-', role.className ?? '-']
        : [role.role, chalk.yellow('not found'), '-', '-']
    );
  }

  const lines = [shapes.toString(), roles.toString()];
  if (verbose) {
    const { issued, recycled, outstanding } = analysis.handles;
    lines.push(chalk.gray(`Nodes: ${analysis.nodeCount}  Handles issued: ${issued}, released: ${recycled}, outstanding: ${outstanding}`));
  }
  return lines.join('\n');
}

const main = async () => {
  program
    .name('run-detector')
    .description('Classify uiautomator dumps against the dialog shapes')
    .version('1.0.0');

  program
    .argument('<xml-path>', 'Path to UI XML dump file or directory containing dumps')
    .option('-v, --verbose', 'Enable verbose output', false)
    .option('-o, --output <file>', 'Save results to JSON file')
    .option('--variants <file>', 'UI variants file to use instead of the bundled one')
    .action(async (xmlPath: string, options: CLIOptions) => {
      try {
        if (options.verbose) {
          logger.updateConfig({ level: 'debug', output: 'console' });
        }

        const variants: UiVariants = loadUiVariants(options.variants);

        console.log(chalk.blue('Dialog Detection CLI'));
        console.log(chalk.gray(`Analyzing: ${xmlPath}`));
        console.log();

        const xmlFiles = await collectXmlFiles(xmlPath);
        if (xmlFiles.length === 0) {
          console.log(chalk.yellow('No XML files found.'));
          return;
        }

        const results: Array<{ file: string; analysis?: DumpAnalysis; error?: string }> = [];

        for (const xmlFile of xmlFiles) {
          console.log(chalk.cyan(`Processing: ${path.basename(xmlFile)}`));

          try {
            const xml = await fs.readFile(xmlFile, 'utf-8');
            const analysis = await analyzeDump(xml, variants);
            if (analysis.reports.length === 0) {
              console.log(chalk.yellow('   Dump contains no window'));
            } else {
              console.log(renderAnalysis(analysis, options.verbose));
            }
            results.push({ file: xmlFile, analysis });
          } catch (error) {
            console.error(chalk.red(`   Failed: ${errorMessage(error)}`));
            results.push({ file: xmlFile, error: errorMessage(error) });
          }

          console.log();
        }

        if (options.output) {
          await fs.writeFile(options.output, JSON.stringify(results, null, 2));
          console.log(chalk.green(`Results saved to: ${options.output}`));
        }
      } catch (error) {
        console.error(chalk.red('Error:'), errorMessage(error));
        process.exit(1);
      }
    });

  program
    .command('validate')
    .description('Validate XML dump format and structure')
    .argument('<xml-path>', 'Path to XML dump file')
    .action(async (xmlPath: string) => {
      try {
        console.log(chalk.blue('Validating XML dump format...'));
        console.log(chalk.gray(`File: ${xmlPath}`));
        console.log();

        const content = await fs.readFile(xmlPath, 'utf-8');
        const tree = parseUiHierarchy(content);

        console.log(chalk.green('XML is well-formed'));
        if (!tree) {
          console.log(chalk.yellow('Dump contains no window'));
          return;
        }

        const statsTable = new Table({
          head: ['Metric', 'Value'],
          colWidths: [20, 30]
        });
        statsTable.push(
          ['Total Nodes', countNodes(tree).toString()],
          ['Root Package', tree.packageName ?? '-'],
          ['Root Class', tree.className ?? '-']
        );
        console.log(statsTable.toString());
      } catch (error) {
        console.error(chalk.red('Validation failed:'), errorMessage(error));
        process.exit(1);
      }
    });

  await program.parseAsync();
};

if (require.main === module) {
  main().catch(error => {
    console.error(chalk.red('Fatal error:'), errorMessage(error));
    process.exit(1);
  });
}
