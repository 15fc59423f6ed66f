import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { z } from 'zod';
import type { IgnoreRule } from '../types';
import {
  extensionRule,
  getDefaultIgnoreRules,
  globRule,
  loadIgnoreFile,
  nameRule,
  parseIgnoreLine,
} from '../scanner/ignore-rules';
import { ConfigError } from './errors';

const CONFIG_FILE_NAMES = [
  'codesnap.config.yaml',
  'codesnap.config.yml',
  'codesnap.config.json',
  '.codesnaprc',
];

export const IGNORE_FILE_NAME = '.codesnapignore';

// ─── Schema ─────────────────────────────────────────────────────────────────

const importPatternSchema = z.object({
  language: z.string().min(1),
  extensions: z.array(z.string().startsWith('.')).min(1),
  patterns: z.array(z.object({
    pattern: z.string().min(1),
    item: z.string().min(1).optional(),
  })).min(1),
  separator: z.string().min(1),
  segments: z.number().int().min(0),
  scoped: z.boolean().optional(),
  localPrefixes: z.array(z.string()).optional(),
  localNames: z.array(z.string()).optional(),
  stripPrefixes: z.array(z.string()).optional(),
  matchLocalModules: z.boolean().optional(),
  matchLocalPaths: z.enum(['package', 'file']).optional(),
  moduleDeclaration: z.object({
    file: z.string().min(1),
    pattern: z.string().min(1),
  }).optional(),
});

const configSchema = z.object({
  ignore: z.object({
    useDefaults: z.boolean().default(true),
    extensions: z.array(z.string()).default([]),
    directories: z.array(z.string()).default([]),
    files: z.array(z.string()).default([]),
    globs: z.array(z.string()).default([]),
  }).default({}),
  extraction: z.object({
    fileTypes: z.array(z.string()).default([]),
  }).default({}),
  dependencies: z.object({
    expand: z.boolean().default(false),
    maxDepth: z.number().int().min(0).default(1),
    include: z.array(z.string()).default([]),
    searchPaths: z.array(z.string()).default([]),
    importPatterns: z.array(importPatternSchema).default([]),
  }).default({}),
  output: z.object({
    directory: z.string().min(1).default('./codesnap-output'),
    logToFile: z.boolean().default(false),
  }).default({}),
});

export type CodesnapConfig = z.infer<typeof configSchema>;

export interface SnapshotCliOptions {
  rootPath: string;
  outputDir: string;
  expandDependencies: boolean;
  maxDepth: number;
  libraries: string[];
  fileTypes: string[];
  ignore: string[];
  verbose: boolean;
  interactive: boolean;
}

// ─── Loading ────────────────────────────────────────────────────────────────

function parseConfig(raw: unknown, source: string): CodesnapConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ConfigError(`Invalid configuration in ${source}: ${field || '(root)'} ${issue.message}`, field, raw);
  }
  return result.data;
}

export function getDefaultConfig(): CodesnapConfig {
  return parseConfig({}, 'defaults');
}

export function findConfigFile(projectPath: string): string | undefined {
  for (const fileName of CONFIG_FILE_NAMES) {
    const filePath = path.join(projectPath, fileName);
    if (fs.existsSync(filePath)) return filePath;
  }
  return undefined;
}

export function loadConfig(projectPath: string): CodesnapConfig {
  const filePath = findConfigFile(projectPath);
  if (!filePath) return getDefaultConfig();

  const content = fs.readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = filePath.endsWith('.json') ? JSON.parse(content) : yaml.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot parse ${filePath}: ${reason}`, 'file', filePath);
  }
  return parseConfig(parsed, filePath);
}

export function saveConfig(projectPath: string, config: CodesnapConfig): string {
  const filePath = path.join(projectPath, 'codesnap.config.yaml');
  fs.writeFileSync(filePath, yaml.stringify(config), 'utf-8');
  return filePath;
}

// ─── Rules ──────────────────────────────────────────────────────────────────

/**
 * Builds the ignore rules for a project: defaults, the config's lists, the
 * project's `.codesnapignore`, and extra ignore-file lines from the caller.
 */
export function buildIgnoreRules(
  projectPath: string,
  config: CodesnapConfig,
  extraLines: readonly string[] = [],
): IgnoreRule[] {
  const rules: IgnoreRule[] = config.ignore.useDefaults ? getDefaultIgnoreRules() : [];

  rules.push(
    ...config.ignore.extensions.map(extensionRule),
    ...config.ignore.directories.map(d => nameRule(d, 'directory')),
    ...config.ignore.files.map(f => nameRule(f, 'file')),
    ...config.ignore.globs.map(globRule),
  );

  const ignoreFile = path.join(projectPath, IGNORE_FILE_NAME);
  if (fs.existsSync(ignoreFile)) {
    rules.push(...loadIgnoreFile(ignoreFile));
  }

  rules.push(...extraLines.flatMap(parseIgnoreLine));

  return rules;
}

// ─── Options ────────────────────────────────────────────────────────────────

export function resolveOptions(
  cliArgs: Partial<SnapshotCliOptions>,
  config: CodesnapConfig,
): SnapshotCliOptions {
  return {
    rootPath: path.resolve(cliArgs.rootPath ?? process.cwd()),
    outputDir: path.resolve(cliArgs.outputDir ?? config.output.directory),
    expandDependencies: cliArgs.expandDependencies ?? config.dependencies.expand,
    maxDepth: cliArgs.maxDepth ?? config.dependencies.maxDepth,
    libraries: cliArgs.libraries && cliArgs.libraries.length > 0
      ? cliArgs.libraries
      : config.dependencies.include,
    fileTypes: cliArgs.fileTypes && cliArgs.fileTypes.length > 0
      ? cliArgs.fileTypes
      : config.extraction.fileTypes,
    ignore: cliArgs.ignore ?? [],
    verbose: cliArgs.verbose ?? false,
    interactive: cliArgs.interactive ?? false,
  };
}
