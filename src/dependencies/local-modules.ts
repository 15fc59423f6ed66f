import * as fs from 'node:fs';
import * as path from 'node:path';
import type { DirectoryTreeNode, TreeNode } from '../types';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';
import { IMPORT_RULES, type LanguageImportRules } from './import-patterns';

/**
 * What a project may import itself by. Built once per walked tree and queried
 * by the analyzer through the flags of each language's import rules.
 */
export class LocalModuleIndex {
  private readonly directoryNames = new Set<string>();
  /** Lowercase extension → stems of the project's files with that extension. */
  private readonly fileStems = new Map<string, Set<string>>();
  /** Lowercase directory paths, root name first, dotted names split into segments. */
  private readonly directoryPaths: string[] = [];
  /** Lowercase file paths, root name first. */
  private readonly filePaths: string[] = [];
  /** Language → module paths declared by the project's manifests. */
  private readonly declared = new Map<string, string[]>();

  constructor(readonly projectName?: string) {}

  static fromTree(
    root: DirectoryTreeNode,
    rules: readonly LanguageImportRules[] = IMPORT_RULES,
    readFile: (filePath: string) => Buffer = filePath => fs.readFileSync(filePath),
  ): LocalModuleIndex {
    const index = new LocalModuleIndex(root.name);
    const declarations = rules.flatMap(rule =>
      rule.moduleDeclaration ? [{ language: rule.language, ...rule.moduleDeclaration }] : [],
    );

    const visit = (node: TreeNode, packageSegments: string[], pathSegments: string[]): void => {
      if (node.kind === 'directory') {
        const nextPackage = [...packageSegments, ...node.name.split('.').filter(Boolean)];
        index.directoryNames.add(node.name);
        index.directoryPaths.push(nextPackage.join('/').toLowerCase());
        node.children.forEach(child => visit(child, nextPackage, [...pathSegments, node.name]));
        return;
      }

      const ext = path.extname(node.name).toLowerCase();
      if (ext) {
        const stems = index.fileStems.get(ext) ?? new Set<string>();
        stems.add(node.name.slice(0, -ext.length));
        index.fileStems.set(ext, stems);
      }
      index.filePaths.push([...pathSegments, node.name].join('/').toLowerCase());

      for (const declaration of declarations) {
        if (node.name !== declaration.file || node.symlinkTarget !== undefined) continue;
        const declared = index.readDeclaration(node.path, declaration.pattern, readFile);
        if (declared) {
          index.declared.set(declaration.language, [...(index.declared.get(declaration.language) ?? []), declared]);
        }
      }
    };

    index.directoryPaths.push(root.name.toLowerCase());
    root.children.forEach(child => visit(child, [root.name], [root.name]));
    return index;
  }

  /** A project directory, or a file of one of `extensions`, carries this name. */
  hasModule(name: string, extensions: readonly string[]): boolean {
    if (this.directoryNames.has(name)) return true;
    return extensions.some(ext => this.fileStems.get(ext.toLowerCase())?.has(name) === true);
  }

  /** A prefix of two or more segments ends a project directory path. */
  hasPackagePath(segments: readonly string[]): boolean {
    for (let count = segments.length; count >= 2; count--) {
      const candidate = segments.slice(0, count).join('/').toLowerCase();
      if (this.directoryPaths.some(dir => endsWithPath(dir, candidate))) return true;
    }
    return false;
  }

  /** The joined segments end a project file path. */
  hasFilePath(segments: readonly string[]): boolean {
    if (segments.length === 0) return false;
    const candidate = segments.join('/').toLowerCase();
    return this.filePaths.some(file => endsWithPath(file, candidate));
  }

  /** The specifier is a declared module path of `language` or lies under one. */
  declaresModule(language: string, specifier: string, separator: string): boolean {
    return (this.declared.get(language) ?? []).some(
      modulePath => specifier === modulePath || specifier.startsWith(`${modulePath}${separator}`),
    );
  }

  private readDeclaration(
    filePath: string,
    pattern: RegExp,
    readFile: (filePath: string) => Buffer,
  ): string | undefined {
    let content: string;
    try {
      content = readFile(filePath).toString('utf-8');
    } catch (error) {
      logger.debug(`Cannot read module declaration ${filePath}: ${errorMessage(error)}`);
      return undefined;
    }
    const match = new RegExp(pattern.source, pattern.flags.replace('g', '')).exec(content);
    return match?.[1]?.trim() || undefined;
  }
}

function endsWithPath(full: string, tail: string): boolean {
  return full === tail || full.endsWith(`/${tail}`);
}
