import * as path from 'node:path';
import type { LibraryReference, ResolutionWarning, SourceFile } from '../types';
import { resolutionWarning } from '../utils/errors';
import { stageLog } from '../utils/logger';
import { IMPORT_RULES, type LanguageImportRules } from './import-patterns';
import type { LibraryLocator } from './library-locator';
import { LocalModuleIndex } from './local-modules';

export interface ResolutionResult {
  libraries: LibraryReference[];
  warnings: ResolutionWarning[];
}

function isBinary(content: string): boolean {
  return content.includes('\u0000');
}

function freshRegex(regex: RegExp): RegExp {
  const flags = regex.flags.includes('g') ? regex.flags : `${regex.flags}g`;
  return new RegExp(regex.source, flags);
}

export class DependencyAnalyzer {
  private readonly byExtension = new Map<string, LanguageImportRules>();

  constructor(rules: readonly LanguageImportRules[] = IMPORT_RULES) {
    for (const rule of rules) {
      for (const ext of rule.extensions) {
        if (!this.byExtension.has(ext)) this.byExtension.set(ext, rule);
      }
    }
  }

  languageFor(filePath: string): LanguageImportRules | undefined {
    return this.byExtension.get(path.extname(filePath).toLowerCase());
  }

  extractSpecifiers(content: string, rules: LanguageImportRules): string[] {
    const specifiers: string[] = [];
    for (const { pattern, item } of rules.patterns) {
      const regex = freshRegex(pattern);
      let m: RegExpExecArray | null;
      while ((m = regex.exec(content)) !== null) {
        if (m[0].length === 0) regex.lastIndex++;
        const captured = m[1];
        if (!captured) continue;
        if (!item) {
          specifiers.push(captured.trim());
          continue;
        }
        const itemRegex = freshRegex(item);
        let im: RegExpExecArray | null;
        while ((im = itemRegex.exec(captured)) !== null) {
          if (im[0].length === 0) itemRegex.lastIndex++;
          if (im[1]) specifiers.push(im[1].trim());
        }
      }
    }
    return specifiers;
  }

  /**
   * Splits a specifier into its segments, or returns `null` when its syntax
   * alone marks it as project-local.
   */
  specifierSegments(specifier: string, rules: LanguageImportRules): string[] | null {
    if (!specifier) return null;
    if (rules.localPrefixes?.some(prefix => specifier.startsWith(prefix))) return null;

    let spec = specifier;
    for (const prefix of rules.stripPrefixes ?? []) {
      if (spec.startsWith(prefix)) spec = spec.slice(prefix.length);
    }

    const parts = spec.split(rules.separator).filter(Boolean);
    if (parts.length === 0) return null;
    if (rules.localNames?.includes(parts[0])) return null;
    return parts;
  }

  /** Returns the library a specifier names, or `null` when it points into the project. */
  libraryName(specifier: string, rules: LanguageImportRules): string | null {
    const parts = this.specifierSegments(specifier, rules);
    return parts === null ? null : this.nameOf(parts, rules);
  }

  analyze(
    files: readonly SourceFile[],
    local: LocalModuleIndex = new LocalModuleIndex(),
  ): LibraryReference[] {
    const found = new Map<string, { language: string; referencedBy: Set<string> }>();

    for (const file of files) {
      const rules = this.languageFor(file.path);
      if (!rules || isBinary(file.content)) continue;

      for (const specifier of this.extractSpecifiers(file.content, rules)) {
        const parts = this.specifierSegments(specifier, rules);
        if (parts === null) continue;
        const name = this.nameOf(parts, rules);
        if (this.isSelfReference(parts, name, rules, local)) continue;

        const entry = found.get(name) ?? { language: rules.language, referencedBy: new Set<string>() };
        entry.referencedBy.add(file.path);
        found.set(name, entry);
      }
    }

    const libraries = [...found.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, entry]) => ({
        name,
        language: entry.language,
        referencedBy: [...entry.referencedBy].sort(),
      }));

    stageLog('dependencies', `Found ${libraries.length} librar${libraries.length === 1 ? 'y' : 'ies'}`, 'debug');
    return libraries;
  }

  /**
   * Attaches install paths for the selected libraries. A library the locator
   * cannot find stays in the list and produces a warning.
   */
  resolve(
    libraries: readonly LibraryReference[],
    locator: LibraryLocator,
    include?: readonly string[],
  ): ResolutionResult {
    const selected = include && include.length > 0 ? new Set(include) : null;
    const warnings: ResolutionWarning[] = [];

    const resolved = libraries.map(lib => {
      if (selected && !selected.has(lib.name)) return { ...lib };

      const installPath = locator.resolve(lib.name, lib.language);
      if (installPath === undefined) {
        warnings.push(resolutionWarning(lib.name, 'not found in any search location'));
        return { ...lib };
      }

      const version = locator.version?.(lib.name, installPath);
      return { ...lib, installPath, ...(version !== undefined ? { version } : {}) };
    });

    return { libraries: resolved, warnings };
  }

  private nameOf(parts: readonly string[], rules: LanguageImportRules): string {
    if (rules.segments === 0) return parts.join(rules.separator);
    const count = rules.scoped && parts[0].startsWith('@') ? rules.segments + 1 : rules.segments;
    return parts.slice(0, count).join(rules.separator);
  }

  private isSelfReference(
    parts: readonly string[],
    name: string,
    rules: LanguageImportRules,
    local: LocalModuleIndex,
  ): boolean {
    if (name === local.projectName) return true;
    if (rules.matchLocalModules && local.hasModule(name, rules.extensions)) return true;
    if (rules.matchLocalPaths === 'package' && local.hasPackagePath(parts)) return true;
    if (rules.matchLocalPaths === 'file' && local.hasFilePath(parts)) return true;
    return local.declaresModule(rules.language, parts.join(rules.separator), rules.separator);
  }
}
