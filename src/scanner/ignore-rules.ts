import * as fs from 'node:fs';
import type { IgnoreRule, IgnoreRuleScope } from '../types';
import { ConfigError } from '../utils/errors';

// ─── Defaults ───────────────────────────────────────────────────────────────

const DEFAULT_IGNORED_DIRECTORIES = [
  'node_modules', '.git', '.svn', '.hg', 'dist', 'build', 'out', 'target', 'vendor',
  '.next', '.nuxt', 'coverage', '.cache', '.turbo',
  '__pycache__', '.venv', 'venv', 'env', '.tox', '.mypy_cache',
  '.pytest_cache', '.ruff_cache',
  '.idea', '.vscode',
];

const DEFAULT_IGNORED_FILES = [
  '.DS_Store', 'Thumbs.db',
  'package-lock.json', 'yarn.lock', 'pnpm-lock.yaml', 'bun.lockb',
  'poetry.lock', 'Pipfile.lock',
];

const DEFAULT_IGNORED_EXTENSIONS = [
  '.map', '.min.js', '.min.css', '.pyc', '.pyo', '.class', '.o', '.so', '.dll', '.exe',
  '.png', '.jpg', '.jpeg', '.gif', '.ico', '.zip', '.tar', '.gz', '.jar',
];

const DEFAULT_IGNORED_GLOBS = ['*.egg-info/'];

export function getDefaultIgnoreRules(): IgnoreRule[] {
  return [
    ...DEFAULT_IGNORED_DIRECTORIES.map(pattern => nameRule(pattern, 'directory')),
    ...DEFAULT_IGNORED_FILES.map(pattern => nameRule(pattern, 'file')),
    ...DEFAULT_IGNORED_EXTENSIONS.map(extensionRule),
    ...DEFAULT_IGNORED_GLOBS.map(globRule),
  ];
}

// ─── Constructors ───────────────────────────────────────────────────────────

export function extensionRule(pattern: string): IgnoreRule {
  const ext = pattern.startsWith('*.') ? pattern.slice(1) : pattern;
  return validateRule({ pattern: ext.toLowerCase(), kind: 'extension', scope: 'file' });
}

export function nameRule(pattern: string, scope: IgnoreRuleScope = 'both'): IgnoreRule {
  return validateRule({ pattern, kind: 'name', scope });
}

export function globRule(pattern: string): IgnoreRule {
  return validateRule({ pattern, kind: 'glob', scope: 'both' });
}

export function validateRule(rule: IgnoreRule): IgnoreRule {
  if (rule.pattern.trim().length === 0) {
    throw new ConfigError('Ignore pattern cannot be empty', 'pattern', rule.pattern);
  }
  if (rule.kind === 'extension' && (!rule.pattern.startsWith('.') || rule.pattern.length < 2)) {
    throw new ConfigError(`Extension rule must start with a dot: "${rule.pattern}"`, 'pattern', rule.pattern);
  }
  if (rule.kind === 'name' && /[\\/]/.test(rule.pattern)) {
    throw new ConfigError(`Name rule cannot contain a path separator: "${rule.pattern}"`, 'pattern', rule.pattern);
  }
  return Object.freeze({ ...rule });
}

// ─── Ignore file parsing ────────────────────────────────────────────────────

const GLOB_CHARS = /[*?[]/;

/**
 * Parses one line of an ignore file.
 *
 * `*.ext` is an extension, `name/` a directory name, anything else containing
 * glob characters a glob. A bare `.token` is both an extension and a name, so
 * `.pyc` and `.git` each do what the line's author meant.
 */
export function parseIgnoreLine(line: string): IgnoreRule[] {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#')) return [];

  if (/^\*\.[^*?[/\\]+$/.test(trimmed)) {
    return [extensionRule(trimmed)];
  }
  if (trimmed.endsWith('/') && !GLOB_CHARS.test(trimmed) && !trimmed.slice(0, -1).includes('/')) {
    return [nameRule(trimmed.slice(0, -1), 'directory')];
  }
  if (GLOB_CHARS.test(trimmed) || trimmed.includes('/')) {
    return [globRule(trimmed)];
  }
  if (trimmed.startsWith('.') && trimmed.length > 1) {
    return [extensionRule(trimmed), nameRule(trimmed)];
  }
  return [nameRule(trimmed)];
}

export function parseIgnoreFile(content: string): IgnoreRule[] {
  return content.split(/\r?\n/).flatMap(parseIgnoreLine);
}

export function loadIgnoreFile(filePath: string): IgnoreRule[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read ignore file ${filePath}`, 'ignoreFile', error);
  }
  return parseIgnoreFile(content);
}
