import * as path from 'node:path';
import ignore from 'ignore';
import type { EntryKind, IgnoreRule } from '../types';
import { validateRule } from './ignore-rules';

type Ignore = ReturnType<typeof ignore>;

/**
 * Decides whether a file-system entry belongs in a snapshot.
 *
 * Extensions compare case-insensitively against the end of the base name,
 * names compare exactly, and globs use gitignore semantics against the path
 * relative to the walk root.
 */
export class PathFilter {
  private readonly extensions: string[] = [];
  private readonly names = new Map<string, Set<EntryKind>>();
  private readonly globs: Ignore | null;

  constructor(rules: readonly IgnoreRule[]) {
    const globPatterns: string[] = [];

    for (const raw of rules) {
      const rule = validateRule(raw);
      if (rule.kind === 'extension') {
        this.extensions.push(rule.pattern.toLowerCase());
      } else if (rule.kind === 'name') {
        const kinds = this.names.get(rule.pattern) ?? new Set<EntryKind>();
        if (rule.scope !== 'directory') kinds.add('file');
        if (rule.scope !== 'file') kinds.add('directory');
        this.names.set(rule.pattern, kinds);
      } else {
        globPatterns.push(rule.pattern);
      }
    }

    this.globs = globPatterns.length > 0 ? ignore().add(globPatterns) : null;
  }

  included(entryPath: string, kind: EntryKind, rootPath?: string): boolean {
    const name = path.basename(entryPath);

    if (this.names.get(name)?.has(kind)) return false;

    if (kind === 'file') {
      const lower = name.toLowerCase();
      if (this.extensions.some(ext => lower.length > ext.length && lower.endsWith(ext))) {
        return false;
      }
    }

    if (this.globs) {
      const relative = rootPath ? path.relative(rootPath, entryPath) : name;
      if (relative && !relative.startsWith('..') && !path.isAbsolute(relative)) {
        const candidate = relative.split(path.sep).join('/');
        if (this.globs.ignores(kind === 'directory' ? `${candidate}/` : candidate)) {
          return false;
        }
      }
    }

    return true;
  }
}
