import { CodemapRenderer, formatSize } from '../../src/render/codemap-renderer';
import type { DirectoryTreeNode, FileTreeNode, TreeNode } from '../../src/types';

function file(relativePath: string, size: number, symlinkTarget?: string): FileTreeNode {
  const name = relativePath.split('/').pop() ?? relativePath;
  return {
    kind: 'file',
    name,
    path: `/proj/${relativePath}`,
    relativePath,
    size,
    ...(symlinkTarget !== undefined ? { symlinkTarget } : {}),
  };
}

function dir(relativePath: string, children: TreeNode[]): DirectoryTreeNode {
  const name = relativePath ? relativePath.split('/').pop() ?? relativePath : 'proj';
  return { kind: 'directory', name, path: `/proj/${relativePath}`, relativePath, children };
}

describe('formatSize', () => {
  it('should print bytes below one kilobyte', () => {
    expect(formatSize(0)).toBe('0 B');
    expect(formatSize(1023)).toBe('1023 B');
  });

  it('should scale larger sizes with one decimal', () => {
    expect(formatSize(1024)).toBe('1.0 KB');
    expect(formatSize(1536)).toBe('1.5 KB');
    expect(formatSize(5 * 1024 * 1024)).toBe('5.0 MB');
    expect(formatSize(3 * 1024 * 1024 * 1024)).toBe('3.0 GB');
  });
});

describe('CodemapRenderer', () => {
  const renderer = new CodemapRenderer();

  it('should render a nested tree with box-drawing connectors', () => {
    const tree = dir('', [
      file('a.py', 21),
      file('b.py', 12),
      dir('src', [
        dir('src/util', [file('src/util/io.py', 2048)]),
        file('src/main.py', 100),
      ]),
      dir('vendor', []),
    ]);

    expect(renderer.render(tree)).toBe([
      'proj/',
      '├── a.py (21 B)',
      '├── b.py (12 B)',
      '├── src/',
      '│   ├── util/',
      '│   │   └── io.py (2.0 KB)',
      '│   └── main.py (100 B)',
      '└── vendor/',
      '',
    ].join('\n'));
  });

  it('should render only the root line for an empty directory', () => {
    expect(renderer.render(dir('', []))).toBe('proj/\n');
  });

  it('should render symbolic links with their target', () => {
    const tree = dir('', [file('current', 7, 'v2/main')]);
    expect(renderer.render(tree)).toBe('proj/\n└── current -> v2/main\n');
  });

  it('should list included libraries with versions when known', () => {
    const text = renderer.renderLibraries([
      { name: 'numpy', language: 'python', referencedBy: ['a.py'], version: '1.26.0' },
      { name: 'requests', language: 'python', referencedBy: ['a.py'] },
    ]);
    expect(text).toBe('Included Libraries:\nnumpy (v1.26.0)\nrequests\n');
  });

  it('should mark an empty library list', () => {
    expect(renderer.renderLibraries([])).toBe('Included Libraries:\n(none)\n');
  });
});
