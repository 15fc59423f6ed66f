import { ConfigError } from '../utils/errors';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface ImportPattern {
  /** Group 1 holds a module specifier, or a list of them when `item` is set. */
  pattern: RegExp;
  /** Applied to group 1 to pull out each specifier of a list. */
  item?: RegExp;
}

export interface LanguageImportRules {
  language: string;
  extensions: string[];
  patterns: ImportPattern[];
  /** Segment separator inside a specifier. */
  separator: string;
  /** Leading segments that make up the library name; 0 keeps the whole specifier. */
  segments: number;
  /** `@scope/name` specifiers keep both segments. */
  scoped?: boolean;
  /** Specifiers starting with one of these point into the project. */
  localPrefixes?: string[];
  /** Names that always point into the project (`crate`, `self`). */
  localNames?: string[];
  /** Removed before naming (`node:fs` is `fs`). */
  stripPrefixes?: string[];
  /** Whether a name equal to a project directory, or the stem of a file in this language, is a self-reference. */
  matchLocalModules?: boolean;
  /**
   * How a specifier maps onto project paths. `package`: a prefix of two or more
   * segments names a project directory. `file`: the whole specifier names a
   * project file.
   */
  matchLocalPaths?: 'package' | 'file';
  /** A manifest declaring the project's own module path (`go.mod`, `package.json`). */
  moduleDeclaration?: ModuleDeclaration;
}

export interface ModuleDeclaration {
  file: string;
  /** Group 1 holds the declared module path. */
  pattern: RegExp;
}

// ─── Built-in table ─────────────────────────────────────────────────────────

export const IMPORT_RULES: LanguageImportRules[] = [
  {
    language: 'python',
    extensions: ['.py', '.pyw'],
    patterns: [
      { pattern: /^[ \t]*from[ \t]+([\w.]+)[ \t]+import\b/gm },
      {
        pattern: /^[ \t]*import[ \t]+([\w.]+(?:[ \t]+as[ \t]+\w+)?(?:[ \t]*,[ \t]*[\w.]+(?:[ \t]+as[ \t]+\w+)?)*)/gm,
        item: /([\w.]+)(?:[ \t]+as[ \t]+\w+)?/g,
      },
    ],
    separator: '.',
    segments: 1,
    localPrefixes: ['.'],
    matchLocalModules: true,
  },
  {
    language: 'javascript',
    extensions: ['.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx', '.mts', '.cts', '.vue', '.svelte'],
    patterns: [
      { pattern: /(?:import|from)\s+['"]([^'"]+)['"]/g },
      { pattern: /\brequire\(\s*['"]([^'"]+)['"]\s*\)/g },
      { pattern: /\bimport\(\s*['"]([^'"]+)['"]\s*\)/g },
    ],
    separator: '/',
    segments: 1,
    scoped: true,
    localPrefixes: ['.', '/', '~/', '@/'],
    stripPrefixes: ['node:'],
    moduleDeclaration: { file: 'package.json', pattern: /"name"\s*:\s*"([^"]+)"/ },
  },
  {
    language: 'go',
    extensions: ['.go'],
    patterns: [
      { pattern: /^[ \t]*import[ \t]+(?:[\w.]+[ \t]+)?"([^"]+)"/gm },
      { pattern: /^[ \t]*import[ \t]*\(([^)]*)\)/gm, item: /"([^"]+)"/g },
    ],
    separator: '/',
    segments: 0,
    moduleDeclaration: { file: 'go.mod', pattern: /^module[ \t]+"?([^\s"]+)"?/m },
  },
  {
    language: 'rust',
    extensions: ['.rs'],
    patterns: [
      { pattern: /^[ \t]*(?:pub(?:\([\w: ]+\))?[ \t]+)?use[ \t]+(?:::)?(\w+)/gm },
      { pattern: /^[ \t]*extern[ \t]+crate[ \t]+(\w+)/gm },
    ],
    separator: '::',
    segments: 1,
    localNames: ['crate', 'self', 'super'],
    matchLocalModules: true,
  },
  {
    language: 'java',
    extensions: ['.java', '.kt', '.kts', '.scala'],
    patterns: [{ pattern: /^[ \t]*import[ \t]+(?:static[ \t]+)?([\w.]+)/gm }],
    separator: '.',
    segments: 2,
    matchLocalPaths: 'package',
  },
  {
    language: 'ruby',
    extensions: ['.rb'],
    patterns: [{ pattern: /^[ \t]*require[ \t(]+['"]([^'"]+)['"]/gm }],
    separator: '/',
    segments: 1,
    localPrefixes: ['.', '/'],
    matchLocalModules: true,
  },
  {
    language: 'c',
    extensions: ['.c', '.h', '.cc', '.cpp', '.cxx', '.hpp', '.hh'],
    patterns: [{ pattern: /^[ \t]*#[ \t]*include[ \t]*<([^>]+)>/gm }],
    separator: '/',
    segments: 1,
    matchLocalPaths: 'file',
  },
  {
    language: 'csharp',
    extensions: ['.cs'],
    patterns: [{ pattern: /^[ \t]*using[ \t]+(?:static[ \t]+)?([\w.]+)[ \t]*;/gm }],
    separator: '.',
    segments: 1,
    matchLocalPaths: 'package',
  },
  {
    language: 'php',
    extensions: ['.php'],
    patterns: [{ pattern: /^[ \t]*use[ \t]+\\?([\w\\]+)/gm }],
    separator: '\\',
    segments: 1,
    matchLocalPaths: 'package',
  },
];

// ─── Configured patterns ────────────────────────────────────────────────────

export interface ImportPatternConfig {
  language: string;
  extensions: string[];
  patterns: Array<{ pattern: string; item?: string }>;
  separator: string;
  segments: number;
  scoped?: boolean;
  localPrefixes?: string[];
  localNames?: string[];
  stripPrefixes?: string[];
  matchLocalModules?: boolean;
  matchLocalPaths?: 'package' | 'file';
  moduleDeclaration?: { file: string; pattern: string };
}

function compilePattern(source: string, field: string): RegExp {
  try {
    const regex = new RegExp(source, 'gm');
    if (!/\((?!\?)/.test(source)) {
      throw new Error('pattern needs a capturing group');
    }
    return regex;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid import pattern "${source}": ${reason}`, field, source);
  }
}

export function compileImportRules(configured: readonly ImportPatternConfig[]): LanguageImportRules[] {
  return configured.map(({ moduleDeclaration, ...entry }) => ({
    ...entry,
    extensions: entry.extensions.map(ext => ext.toLowerCase()),
    patterns: entry.patterns.map(p => ({
      pattern: compilePattern(p.pattern, `importPatterns.${entry.language}.pattern`),
      item: p.item !== undefined ? compilePattern(p.item, `importPatterns.${entry.language}.item`) : undefined,
    })),
    ...(moduleDeclaration ? {
      moduleDeclaration: {
        file: moduleDeclaration.file,
        pattern: compilePattern(moduleDeclaration.pattern, `importPatterns.${entry.language}.moduleDeclaration`),
      },
    } : {}),
  }));
}

/** Configured languages come first so they can override a built-in extension. */
export function buildImportRules(configured: readonly ImportPatternConfig[] = []): LanguageImportRules[] {
  return [...compileImportRules(configured), ...IMPORT_RULES];
}
