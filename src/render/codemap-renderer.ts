import type { LibraryReference, TreeNode } from '../types';

const UNITS = ['KB', 'MB', 'GB'];

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${UNITS[unit]}`;
}

export class CodemapRenderer {
  render(root: TreeNode): string {
    const lines: string[] = [];
    if (root.kind === 'directory') {
      lines.push(`${root.name}/`);
      this.renderTreeToLines(root.children, lines, '');
    } else {
      lines.push(this.label(root));
    }
    return `${lines.join('\n')}\n`;
  }

  renderLibraries(libraries: readonly LibraryReference[]): string {
    const s = ['Included Libraries:'];
    if (libraries.length === 0) {
      s.push('(none)');
    }
    for (const lib of libraries) {
      s.push(lib.version ? `${lib.name} (v${lib.version})` : lib.name);
    }
    return `${s.join('\n')}\n`;
  }

  private renderTreeToLines(nodes: readonly TreeNode[], lines: string[], indent: string): void {
    for (let i = 0; i < nodes.length; i++) {
      const node = nodes[i];
      const isLast = i === nodes.length - 1;
      const prefix = isLast ? '└── ' : '├── ';

      lines.push(`${indent}${prefix}${this.label(node)}`);
      if (node.kind === 'directory' && node.children.length > 0) {
        const childIndent = indent + (isLast ? '    ' : '│   ');
        this.renderTreeToLines(node.children, lines, childIndent);
      }
    }
  }

  private label(node: TreeNode): string {
    if (node.kind === 'directory') return `${node.name}/`;
    if (node.symlinkTarget !== undefined) return `${node.name} -> ${node.symlinkTarget}`;
    return `${node.name} (${formatSize(node.size)})`;
  }
}
