#!/usr/bin/env node

import * as path from 'node:path';
import * as fs from 'node:fs';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { prompt } from 'enquirer';
import type { SnapshotWarning } from './types';
import {
  buildIgnoreRules,
  findConfigFile,
  getDefaultConfig,
  loadConfig,
  resolveOptions,
  saveConfig,
  type CodesnapConfig,
  type SnapshotCliOptions,
} from './utils/config';
import logger, { addFileTransport, setLogLevel } from './utils/logger';
import { errorMessage } from './utils/errors';
import { SnapshotOrchestrator } from './orchestrator/snapshot-orchestrator';
import { DirectorySink } from './extract/output-sink';
import { CodemapRenderer } from './render/codemap-renderer';
import { buildImportRules } from './dependencies/import-patterns';
import { createDefaultLocator } from './dependencies/library-locator';

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    logger.debug(`Cannot read package version: ${errorMessage(error)}`);
  }
  return '0.0.0';
}

/** `2026.10.19_14.05.09`, the run folder stamp. */
export function formatRunStamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${date.getFullYear()}.${pad(date.getMonth() + 1)}.${pad(date.getDate())}`
    + `_${pad(date.getHours())}.${pad(date.getMinutes())}.${pad(date.getSeconds())}`;
}

function splitList(value: string, previous: string[] = []): string[] {
  return [...previous, ...value.split(',').map(v => v.trim()).filter(Boolean)];
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function parseDepth(value: string): number {
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return depth;
}

function printWarnings(warnings: readonly SnapshotWarning[]): void {
  if (warnings.length === 0) return;
  console.log(chalk.yellow(`\n  ${warnings.length} warning(s):`));
  for (const w of warnings) {
    const subject = w.type === 'read' ? w.path : w.library;
    console.log(chalk.yellow(`    • [${w.type}] ${subject}: ${w.message}`));
  }
}

// ─── Command option shapes ───────────────────────────────────────────────────

interface SnapshotCommandOptions {
  output?: string;
  expandDeps?: boolean;
  maxDepth?: number;
  libraries?: string[];
  types?: string[];
  ignore?: string[];
  interactive?: boolean;
  verbose?: boolean;
}

interface ScanCommandOptions {
  ignore?: string[];
  json?: boolean;
}

interface InitCommandOptions {
  force?: boolean;
}

// ─── Interactive selection ───────────────────────────────────────────────────

async function chooseInteractively(
  orchestrator: SnapshotOrchestrator,
  options: SnapshotCliOptions,
  config: CodesnapConfig,
): Promise<SnapshotCliOptions> {
  const survey = orchestrator.survey({
    rootPath: options.rootPath,
    rules: buildIgnoreRules(options.rootPath, config, options.ignore),
    importRules: buildImportRules(config.dependencies.importPatterns),
  });

  let fileTypes = options.fileTypes;
  if (survey.fileTypes.length > 0) {
    const answer = await prompt<{ fileTypes: string[] }>({
      type: 'multiselect',
      name: 'fileTypes',
      message: 'File types to include (none selected = all)',
      choices: survey.fileTypes,
    });
    fileTypes = answer.fileTypes;
  }

  let libraries = options.libraries;
  let expandDependencies = options.expandDependencies;
  if (survey.libraries.length > 0) {
    const answer = await prompt<{ libraries: string[] }>({
      type: 'multiselect',
      name: 'libraries',
      message: 'Libraries to snapshot (none selected = skip libraries)',
      choices: survey.libraries.map(lib => lib.name),
    });
    libraries = answer.libraries;
    expandDependencies = answer.libraries.length > 0;
  }

  return { ...options, fileTypes, libraries, expandDependencies };
}

// ─── Program ────────────────────────────────────────────────────────────────

export function createProgram(): Command {
  const program = new Command();
  const orchestrator = new SnapshotOrchestrator();

  program
    .name('codesnap')
    .description('Snapshot a project for language models: codemap, flat codebase extraction and library analysis')
    .version(readVersion());

  // ─── codesnap snapshot ─────────────────────────────────────────────────────

  program
    .command('snapshot', { isDefault: true })
    .description('Write a codemap, a flat copy of the codebase and a dependency report')
    .argument('[root]', 'Project root directory', process.cwd())
    .option('-o, --output <dir>', 'Output directory (default: config output.directory)')
    .option('--expand-deps', 'Snapshot every installed library the project imports')
    .option('--max-depth <n>', 'How many levels of libraries to expand', parseDepth)
    .option('--libraries <names>', 'Comma-separated libraries to expand', splitList)
    .option('--types <exts>', 'Comma-separated file extensions to extract (e.g. .ts,.py)', splitList)
    .option('--ignore <pattern>', 'Extra ignore pattern, ignore-file syntax (repeatable)', collect)
    .option('-i, --interactive', 'Choose file types and libraries interactively', false)
    .option('-v, --verbose', 'Verbose output', false)
    .action(async (root: string, opts: SnapshotCommandOptions) => {
      const rootPath = path.resolve(root);
      if (opts.verbose) setLogLevel('debug');

      const spinner = ora();
      try {
        const config = loadConfig(rootPath);
        let options = resolveOptions({
          rootPath,
          outputDir: opts.output,
          expandDependencies: opts.expandDeps,
          maxDepth: opts.maxDepth,
          libraries: opts.libraries,
          fileTypes: opts.types,
          ignore: opts.ignore,
          verbose: opts.verbose,
          interactive: opts.interactive,
        }, config);

        const outputInside = path.relative(rootPath, options.outputDir);
        if (outputInside && !outputInside.startsWith('..') && !path.isAbsolute(outputInside)) {
          options.ignore = [...options.ignore, `/${outputInside.split(path.sep).join('/')}/`];
        }

        if (options.interactive) {
          options = await chooseInteractively(orchestrator, options, config);
        }

        const runDir = path.join(options.outputDir, path.basename(rootPath), `snapshot-${formatRunStamp(new Date())}`);
        if (config.output.logToFile) addFileTransport(path.dirname(runDir));

        spinner.start(chalk.cyan(`Snapshotting ${rootPath}...`));
        const { snapshot, warnings } = orchestrator.run({
          rootPath,
          rules: buildIgnoreRules(rootPath, config, options.ignore),
          sink: new DirectorySink(runDir),
          expandDependencies: options.expandDependencies,
          maxDepth: options.maxDepth,
          libraries: options.libraries,
          fileTypes: options.fileTypes,
          locator: createDefaultLocator(rootPath, config.dependencies.searchPaths.map(p => path.resolve(rootPath, p))),
          importRules: buildImportRules(config.dependencies.importPatterns),
        });
        spinner.succeed(chalk.green('Snapshot complete'));

        console.log(chalk.green(`  Output:     ${runDir}`));
        console.log(chalk.white(`  Files:      ${snapshot.files.length} extracted`));
        console.log(chalk.white(`  Libraries:  ${snapshot.libraries.length} detected, ${snapshot.dependencies.length} expanded`));
        printWarnings(warnings);
        console.log();
      } catch (error) {
        spinner.fail(chalk.red('Snapshot failed'));
        program.error(chalk.red(`Error: ${errorMessage(error)}`), { exitCode: 1 });
      }
    });

  // ─── codesnap codemap ──────────────────────────────────────────────────────

  program
    .command('codemap')
    .description('Print the codemap of a project')
    .argument('[root]', 'Project root directory', process.cwd())
    .option('--ignore <pattern>', 'Extra ignore pattern, ignore-file syntax (repeatable)', collect)
    .action((root: string, opts: ScanCommandOptions) => {
      const rootPath = path.resolve(root);
      try {
        const config = loadConfig(rootPath);
        const survey = orchestrator.survey({
          rootPath,
          rules: buildIgnoreRules(rootPath, config, opts.ignore),
          importRules: buildImportRules(config.dependencies.importPatterns),
        });
        process.stdout.write(new CodemapRenderer().render(survey.tree));
        printWarnings(survey.warnings);
      } catch (error) {
        program.error(chalk.red(`Error: ${errorMessage(error)}`), { exitCode: 1 });
      }
    });

  // ─── codesnap deps ─────────────────────────────────────────────────────────

  program
    .command('deps')
    .description('List the libraries a project imports')
    .argument('[root]', 'Project root directory', process.cwd())
    .option('--ignore <pattern>', 'Extra ignore pattern, ignore-file syntax (repeatable)', collect)
    .option('--json', 'Print JSON instead of text', false)
    .action((root: string, opts: ScanCommandOptions) => {
      const rootPath = path.resolve(root);
      try {
        const config = loadConfig(rootPath);
        const survey = orchestrator.survey({
          rootPath,
          rules: buildIgnoreRules(rootPath, config, opts.ignore),
          importRules: buildImportRules(config.dependencies.importPatterns),
        });

        if (opts.json) {
          process.stdout.write(`${JSON.stringify(survey.libraries, null, 2)}\n`);
          return;
        }

        console.log(chalk.bold.cyan(`\nLibraries imported by ${path.basename(rootPath)}\n`));
        if (survey.libraries.length === 0) {
          console.log(chalk.gray('  No libraries detected.\n'));
          return;
        }
        for (const lib of survey.libraries) {
          console.log(`  ${chalk.bold(lib.name)} ${chalk.gray(`(${lib.language})`)}`);
          console.log(chalk.gray(`    ${lib.referencedBy.join(', ')}`));
        }
        console.log();
      } catch (error) {
        program.error(chalk.red(`Error: ${errorMessage(error)}`), { exitCode: 1 });
      }
    });

  // ─── codesnap init ─────────────────────────────────────────────────────────

  program
    .command('init')
    .description('Write a default codesnap.config.yaml to the project')
    .argument('[root]', 'Project root directory', process.cwd())
    .option('--force', 'Overwrite an existing configuration', false)
    .action((root: string, opts: InitCommandOptions) => {
      const rootPath = path.resolve(root);
      const existing = findConfigFile(rootPath);
      if (existing && !opts.force) {
        console.log(chalk.yellow(`\nConfiguration already exists: ${existing}`));
        console.log(chalk.gray('Use --force to overwrite it.\n'));
        return;
      }
      const filePath = saveConfig(rootPath, getDefaultConfig());
      console.log(chalk.green(`\n✅ Created ${filePath}\n`));
    });

  return program;
}

// ─── Entry point ─────────────────────────────────────────────────────────────

if (require.main === module) {
  process.on('uncaughtException', (error) => {
    logger.error(`Uncaught exception: ${error.message}`);
    if (error.stack) logger.error(error.stack);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
    process.exit(1);
  });

  process.on('SIGINT', () => {
    console.log(chalk.yellow('\n\nInterrupted. Exiting...'));
    process.exit(130);
  });

  createProgram().parseAsync(process.argv).catch((error: unknown) => {
    logger.error(errorMessage(error));
    process.exit(1);
  });
}
