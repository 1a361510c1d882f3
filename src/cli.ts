#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import * as fs from 'fs/promises';
import { configTemplate, CONFIG_FILE_NAMES, loadConfig } from './config/config-loader.js';
import type { SerializedScanResult } from './core/serialize.js';
import { ConfigurationError } from './errors.js';
import { MarkdownGenerator } from './generators/markdown-generator.js';
import { InMemoryProgressSink, InMemoryScanStore } from './service/memory.js';
import { ScanService } from './service/scan-service.js';
import type { ScanConfig } from './types.js';

type OutputFormat = 'json' | 'markdown' | 'all';

interface ScanOptions {
  config?: string;
  output: string;
  format: OutputFormat;
  concurrency?: number;
  maxLineDistance?: number;
  edges: boolean;
  workflows: boolean;
  diagrams: boolean;
  ci?: boolean;
}

interface InitOptions {
  force?: boolean;
}

const program = new Command();

program
  .name('flowstory')
  .description('Scan a repository into a workflow graph and narrate what happens when a user acts')
  .version('0.1.0');

function parseInteger(min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer of at least ${min}.`);
    }
    return parsed;
  };
}

function parseFormat(value: string): OutputFormat {
  if (value === 'json' || value === 'markdown' || value === 'all') return value;
  throw new InvalidArgumentError('Expected json, markdown or all.');
}

/**
 * Command-line flags layered over the loaded configuration
 */
function applyOverrides(config: ScanConfig, options: ScanOptions): ScanConfig {
  const edges = config.scanner.edgeInference;
  return {
    ...config,
    scanner: {
      ...config.scanner,
      concurrency: options.concurrency ?? config.scanner.concurrency,
      edgeInference: {
        ...edges,
        enabled: options.edges && edges.enabled,
        maxLineDistance: options.maxLineDistance ?? edges.maxLineDistance,
      },
    },
    analysis: {
      ...config.analysis,
      workflows: options.workflows && config.analysis.workflows,
    },
  };
}

async function writeOutputs(
  result: SerializedScanResult,
  options: ScanOptions
): Promise<string[]> {
  const outputDir = path.resolve(options.output);
  await fs.mkdir(outputDir, { recursive: true });
  const written: string[] = [];

  if (options.format === 'json' || options.format === 'all') {
    const jsonPath = path.join(outputDir, 'results.json');
    await fs.writeFile(jsonPath, JSON.stringify(result, null, 2));
    written.push(jsonPath);
  }

  if (options.format === 'markdown' || options.format === 'all') {
    const generator = new MarkdownGenerator();
    const storiesPath = path.join(outputDir, 'stories.md');
    await fs.writeFile(
      storiesPath,
      generator.generateStories(result, { diagrams: options.diagrams })
    );
    written.push(storiesPath);

    const issues = generator.generateIssues(result);
    if (issues) {
      const issuesPath = path.join(outputDir, 'issues.md');
      await fs.writeFile(issuesPath, issues);
      written.push(issuesPath);
    }
  }

  return written;
}

function printSummary(result: SerializedScanResult): void {
  console.log(chalk.green.bold('\n📈 Scan Summary\n'));
  console.log(`  Files scanned: ${result.files_scanned}/${result.total_files}`);
  console.log(`  Operations: ${result.nodes.length}`);
  console.log(`  Edges: ${result.edges.length}`);
  console.log(`  Workflows: ${result.workflows.length}`);
  if (result.errors.length > 0) {
    console.log(chalk.yellow(`  Errors: ${result.errors.length}`));
  }
  console.log(chalk.gray(`\n  Completed in ${result.scan_time_seconds}s`));
}

/**
 * Scan command - builds the workflow graph and writes results
 */
program
  .command('scan')
  .description('Scan a repository for workflows')
  .argument('[path]', 'Repository to scan', '.')
  .option('-c, --config <path>', 'Path to config file')
  .option('-o, --output <dir>', 'Output directory', './flowstory-output')
  .option('--format <type>', 'Output format: json, markdown, all', parseFormat, 'all')
  .option('--concurrency <n>', 'Files scanned at once', parseInteger(1))
  .option('--max-line-distance <n>', 'Largest gap for sequential edges', parseInteger(0))
  .option('--no-edges', 'Skip edge inference')
  .option('--no-workflows', 'Skip workflow analysis')
  .option('--no-diagrams', 'Leave Mermaid diagrams out of stories.md')
  .option('--ci', 'CI mode: minimal output, exit codes for errors')
  .action(async (target: string, options: ScanOptions) => {
    const isCI = options.ci === true || process.env.CI === 'true';

    if (!isCI) {
      console.log(chalk.blue.bold('\n🔎 flowstory - Workflow Scanner\n'));
    }

    const sink = new InMemoryProgressSink();
    const service = new ScanService(new InMemoryScanStore(), sink);

    try {
      const cwd = process.cwd();
      const { config, source } = await loadConfig(options.config, cwd);
      if (!isCI) {
        console.log(
          chalk.gray(source ? `Loading config from: ${source}` : 'Using default configuration')
        );
      }

      const scanId = await service.start({
        repositoryPath: path.resolve(cwd, target),
        config: applyOverrides(config, options),
      });

      const unsubscribe = isCI
        ? () => undefined
        : sink.subscribe(scanId, (snapshot) => console.log(chalk.gray(`  ${snapshot.message}`)));

      const onInterrupt = (): void => {
        if (service.cancel(scanId)) {
          console.log(chalk.yellow('\n⏹  Cancelling scan...'));
        }
      };
      process.on('SIGINT', onInterrupt);

      let result: SerializedScanResult;
      try {
        result = await service.wait(scanId);
      } finally {
        process.off('SIGINT', onInterrupt);
        unsubscribe();
      }

      const written = await writeOutputs(result, options);

      if (isCI) {
        console.log(
          `✅ Scanned: ${result.files_scanned} files, ${result.nodes.length} operations, ${result.workflows.length} workflows`
        );
      } else {
        for (const file of written) console.log(chalk.green(`📄 ${file}`));
        printSummary(result);
      }

      if (result.status === 'cancelled') {
        console.log(chalk.yellow('Scan was cancelled; results are partial.'));
        process.exitCode = 130;
      } else if (isCI && result.errors.length > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      const label = error instanceof ConfigurationError ? 'Configuration error:' : 'Error:';
      console.error(isCI ? label : chalk.red(`\n❌ ${label}`), (error as Error).message);
      process.exitCode = 1;
    } finally {
      await service.dispose();
    }
  });

/**
 * Init command - creates config file
 */
program
  .command('init')
  .description('Write a flowstory configuration file')
  .option('-f, --force', 'Overwrite existing config')
  .action(async (options: InitOptions) => {
    const configPath = path.resolve(CONFIG_FILE_NAMES[0]);

    try {
      const exists = await fs
        .access(configPath)
        .then(() => true)
        .catch(() => false);

      if (exists && !options.force) {
        console.log(chalk.yellow('Config file already exists. Use --force to overwrite.'));
        return;
      }

      await fs.writeFile(configPath, configTemplate(), 'utf-8');
      console.log(chalk.green(`✅ Created ${configPath}`));
      console.log(chalk.gray("\nRun 'flowstory scan' to scan this repository."));
    } catch (error) {
      console.error(chalk.red('Failed to create config:'), (error as Error).message);
      process.exitCode = 1;
    }
  });

program.parse();
