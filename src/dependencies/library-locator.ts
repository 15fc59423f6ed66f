import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Finds where a library is installed on the host. Implementations never
 * throw for a missing library; they return `undefined`.
 *
 * `languages` names the import languages a locator serves. A locator without
 * it is asked for every language.
 */
export interface LibraryLocator {
  readonly languages?: readonly string[];
  resolve(name: string, language?: string): string | undefined;
  version?(name: string, installPath: string): string | undefined;
}

function isDirectory(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isDirectory();
  } catch {
    return false;
  }
}

function readJsonVersion(filePath: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
      const { version } = parsed;
      return typeof version === 'string' ? version : undefined;
    }
  } catch {
    return undefined;
  }
  return undefined;
}

// ─── node_modules ───────────────────────────────────────────────────────────

export class NodeModulesLocator implements LibraryLocator {
  readonly languages = ['javascript'];
  private readonly searchRoots: string[];

  constructor(searchRoots: string[]) {
    this.searchRoots = searchRoots.map(r => path.resolve(r));
  }

  resolve(name: string): string | undefined {
    for (const start of this.searchRoots) {
      let dir = start;
      for (;;) {
        const candidate = path.join(dir, 'node_modules', name);
        if (isDirectory(candidate)) return candidate;
        const parent = path.dirname(dir);
        if (parent === dir) break;
        dir = parent;
      }
    }
    return undefined;
  }

  version(_name: string, installPath: string): string | undefined {
    return readJsonVersion(path.join(installPath, 'package.json'));
  }
}

// ─── site-packages ──────────────────────────────────────────────────────────

export class SitePackagesLocator implements LibraryLocator {
  constructor(
    private readonly directories: string[],
    readonly languages?: readonly string[],
  ) {}

  resolve(name: string): string | undefined {
    for (const dir of this.directories) {
      const pkgDir = path.join(dir, name);
      if (isDirectory(pkgDir)) return pkgDir;
    }
    return undefined;
  }

  version(name: string, installPath: string): string | undefined {
    const dir = path.dirname(installPath);
    const normalized = name.toLowerCase().replace(/-/g, '_');
    let entries: string[];
    try {
      entries = fs.readdirSync(dir);
    } catch {
      return undefined;
    }
    for (const entry of entries.sort()) {
      const match = entry.match(/^(.+?)-([^-]+)\.(?:dist-info|egg-info)$/);
      if (match && match[1].toLowerCase().replace(/-/g, '_') === normalized) {
        return match[2];
      }
    }
    return undefined;
  }
}

/** Finds `.venv/lib/python3.x/site-packages` style directories under a project. */
export function discoverSitePackages(projectRoot: string): string[] {
  const found: string[] = [];
  for (const venv of ['.venv', 'venv', 'env']) {
    const libDir = path.join(projectRoot, venv, 'lib');
    let entries: string[];
    try {
      entries = fs.readdirSync(libDir);
    } catch {
      continue;
    }
    for (const entry of entries.sort()) {
      const candidate = path.join(libDir, entry, 'site-packages');
      if (entry.startsWith('python') && isDirectory(candidate)) {
        found.push(candidate);
      }
    }
  }
  return found;
}

// ─── Composite ──────────────────────────────────────────────────────────────

export class CompositeLocator implements LibraryLocator {
  private readonly owners = new Map<string, LibraryLocator>();

  constructor(private readonly locators: LibraryLocator[]) {}

  resolve(name: string, language?: string): string | undefined {
    for (const locator of this.locators) {
      if (language !== undefined && locator.languages && !locator.languages.includes(language)) continue;
      const found = locator.resolve(name, language);
      if (found !== undefined) {
        this.owners.set(found, locator);
        return found;
      }
    }
    return undefined;
  }

  version(name: string, installPath: string): string | undefined {
    return this.owners.get(installPath)?.version?.(name, installPath);
  }
}

export function createDefaultLocator(projectRoot: string, searchPaths: string[] = []): LibraryLocator {
  return new CompositeLocator([
    new NodeModulesLocator([projectRoot]),
    new SitePackagesLocator(discoverSitePackages(projectRoot), ['python']),
    new SitePackagesLocator(searchPaths),
  ]);
}
