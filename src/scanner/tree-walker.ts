import * as fs from 'node:fs';
import * as path from 'node:path';
import type { DirectoryTreeNode, FileTreeNode, ReadWarning, TreeNode } from '../types';
import { ConfigError, readWarning } from '../utils/errors';
import { stageLog } from '../utils/logger';
import { PathFilter } from './path-filter';

export interface WalkerFs {
  readdirSync(dir: string, options: { withFileTypes: true }): fs.Dirent[];
  statSync(filePath: string): fs.Stats;
  lstatSync(filePath: string): fs.Stats;
  readlinkSync(filePath: string): string;
}

export interface WalkResult {
  tree: DirectoryTreeNode;
  warnings: ReadWarning[];
}

const nodeFs: WalkerFs = {
  readdirSync: (dir, options) => fs.readdirSync(dir, options),
  statSync: filePath => fs.statSync(filePath),
  lstatSync: filePath => fs.lstatSync(filePath),
  readlinkSync: filePath => fs.readlinkSync(filePath),
};

function byName(a: fs.Dirent, b: fs.Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

export class TreeWalker {
  constructor(
    private readonly filter: PathFilter,
    private readonly fsImpl: WalkerFs = nodeFs,
  ) {}

  walk(rootPath: string): WalkResult {
    const root = path.resolve(rootPath);
    const warnings: ReadWarning[] = [];

    let stats: fs.Stats;
    try {
      stats = this.fsImpl.statSync(root);
    } catch {
      throw new ConfigError(`Root directory does not exist: ${root}`, 'rootPath', rootPath);
    }
    if (!stats.isDirectory()) {
      throw new ConfigError(`Root path is not a directory: ${root}`, 'rootPath', rootPath);
    }

    let entries: fs.Dirent[];
    try {
      entries = this.fsImpl.readdirSync(root, { withFileTypes: true });
    } catch (error) {
      throw new ConfigError(`Root directory is not readable: ${root}`, 'rootPath', error);
    }

    stageLog('walk', `Walking ${root}`, 'debug');
    const tree: DirectoryTreeNode = {
      kind: 'directory',
      name: path.basename(root),
      path: root,
      relativePath: '',
      children: this.visitEntries(root, root, entries, warnings),
    };

    stageLog('walk', `Walked ${root} with ${warnings.length} warning(s)`, 'debug');
    return { tree, warnings };
  }

  private visitEntries(
    root: string,
    dir: string,
    entries: fs.Dirent[],
    warnings: ReadWarning[],
  ): TreeNode[] {
    const nodes: TreeNode[] = [];

    for (const entry of [...entries].sort(byName)) {
      const full = path.join(dir, entry.name);
      const relativePath = path.relative(root, full).split(path.sep).join('/');

      if (entry.isDirectory()) {
        if (!this.filter.included(full, 'directory', root)) continue;

        let children: fs.Dirent[];
        try {
          children = this.fsImpl.readdirSync(full, { withFileTypes: true });
        } catch (error) {
          warnings.push(readWarning(full, error));
          continue;
        }

        nodes.push({
          kind: 'directory',
          name: entry.name,
          path: full,
          relativePath,
          children: this.visitEntries(root, full, children, warnings),
        });
        continue;
      }

      if (!entry.isFile() && !entry.isSymbolicLink()) continue;
      if (!this.filter.included(full, 'file', root)) continue;

      try {
        const stats = this.fsImpl.lstatSync(full);
        nodes.push({
          kind: 'file',
          name: entry.name,
          path: full,
          relativePath,
          size: stats.size,
          ...(entry.isSymbolicLink() ? { symlinkTarget: this.fsImpl.readlinkSync(full) } : {}),
        });
      } catch (error) {
        warnings.push(readWarning(full, error));
      }
    }

    return nodes;
  }
}

export function countFiles(node: TreeNode): { files: number; bytes: number } {
  if (node.kind === 'file') return { files: 1, bytes: node.size };
  return node.children.reduce(
    (acc, child) => {
      const sub = countFiles(child);
      return { files: acc.files + sub.files, bytes: acc.bytes + sub.bytes };
    },
    { files: 0, bytes: 0 },
  );
}

export function collectFileNodes(node: TreeNode): FileTreeNode[] {
  if (node.kind === 'file') return [node];
  return node.children.flatMap(collectFileNodes);
}
