import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { SnapshotOrchestrator } from '../../src/orchestrator/snapshot-orchestrator';
import { MemorySink } from '../../src/extract/output-sink';
import { extensionRule } from '../../src/scanner/ignore-rules';
import type { LibraryLocator } from '../../src/dependencies/library-locator';
import type { WalkerFs } from '../../src/scanner/tree-walker';
import { ConfigError } from '../../src/utils/errors';
import * as loggerModule from '../../src/utils/logger';

let tempDir: string;
let projectDir: string;

const fixedClock = () => new Date('2026-03-01T12:00:00.000Z');

function write(relative: string, content = ''): void {
  const full = path.join(tempDir, relative);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content, 'utf-8');
}

function locatorFor(installed: Record<string, string>): LibraryLocator {
  return {
    resolve: name => installed[name],
  };
}

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'codesnap-run-'));
  projectDir = path.join(tempDir, 'proj');
  write('proj/a.py', 'import os\nimport requests\n');
  write('proj/b.py', 'import proj.a\n');
  write('proj/vendor/x.txt', 'vendored notes\n');
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('SnapshotOrchestrator', () => {
  const orchestrator = new SnapshotOrchestrator();

  it('should snapshot a project with ignore rules applied', () => {
    const sink = new MemorySink();
    const { snapshot, warnings } = orchestrator.run({
      rootPath: projectDir,
      rules: [extensionRule('.txt')],
      sink,
      clock: fixedClock,
    });

    expect(warnings).toEqual([]);
    expect(snapshot.codemap).toBe('proj/\n├── a.py (26 B)\n├── b.py (14 B)\n└── vendor/\n');
    expect(snapshot.files.map(f => f.outputName)).toEqual(['a.py', 'b.py']);
    expect(snapshot.libraries.map(l => l.name)).toEqual(['os', 'requests']);
    expect(snapshot.dependencies).toEqual([]);
    expect(snapshot.depth).toBe(0);
    expect(snapshot.createdAt).toBe('2026-03-01T12:00:00.000Z');
    expect(snapshot.runId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);

    expect(sink.keys()).toEqual([
      'codebase/a.py',
      'codebase/b.py',
      'dependency-report.json',
      'dependency-report.txt',
      'proj-codemap.txt',
      'proj-manifest.json',
    ]);
    expect(sink.readText('codebase/a.py')).toBe('import os\nimport requests\n');
  });

  it('should not resolve or expand libraries unless asked to', () => {
    const resolve = jest.fn<string | undefined, [string, string?]>(() => undefined);
    const { snapshot } = orchestrator.run({
      rootPath: projectDir,
      rules: [],
      sink: new MemorySink(),
      locator: { resolve },
    });

    expect(snapshot.libraries.length).toBe(2);
    expect(snapshot.dependencies).toEqual([]);
    expect(resolve).not.toHaveBeenCalled();
  });

  it('should only consider extracted file types for dependency analysis', () => {
    write('proj/tool.js', "require('lodash');\n");
    const { snapshot } = orchestrator.run({
      rootPath: projectDir,
      rules: [],
      sink: new MemorySink(),
      fileTypes: ['.js'],
    });

    expect(snapshot.files.map(f => f.relativePath)).toEqual(['tool.js']);
    expect(snapshot.libraries.map(l => l.name)).toEqual(['lodash']);
  });

  it('should expand resolved libraries into nested snapshots', () => {
    write('site/requests/__init__.py', 'import urllib3\nfrom . import api\n');
    write('site/requests/api.py', 'def get(): pass\n');
    const installPath = path.join(tempDir, 'site', 'requests');

    const sink = new MemorySink();
    const { snapshot, warnings } = orchestrator.run({
      rootPath: projectDir,
      rules: [extensionRule('.txt')],
      sink,
      expandDependencies: true,
      locator: locatorFor({ requests: installPath }),
      clock: fixedClock,
    });

    expect(warnings).toEqual([{ type: 'resolution', library: 'os', message: 'not found in any search location' }]);
    expect(snapshot.libraries).toEqual([
      { name: 'os', language: 'python', referencedBy: ['a.py'] },
      {
        name: 'requests',
        language: 'python',
        referencedBy: ['a.py'],
        installPath,
        fileCount: 2,
        totalSize: 49,
      },
    ]);

    expect(snapshot.dependencies.length).toBe(1);
    const [nested] = snapshot.dependencies;
    expect(nested.name).toBe('requests');
    expect(nested.depth).toBe(1);
    expect(nested.runId).toBe(snapshot.runId);
    expect(nested.libraries.map(l => l.name)).toEqual(['urllib3']);
    expect(nested.libraries[0].installPath).toBeUndefined();
    expect(nested.dependencies).toEqual([]);

    expect(sink.keys()).toContain('libraries/requests/codebase/__init__.py');
    expect(sink.keys()).toContain('libraries/requests/codebase/api.py');
    expect(sink.keys()).toContain('libraries/requests/requests-codemap.txt');
    expect(sink.readText('libraries/requests/requests-codemap.txt')).toBe(
      'requests/\n├── __init__.py (33 B)\n└── api.py (16 B)\n\nIncluded Libraries:\nurllib3\n',
    );
  });

  it('should restrict expansion to the selected libraries', () => {
    write('site/requests/__init__.py', '');
    const resolve = jest.fn<string | undefined, [string, string?]>(() => path.join(tempDir, 'site', 'requests'));

    const { snapshot, warnings } = orchestrator.run({
      rootPath: projectDir,
      rules: [],
      sink: new MemorySink(),
      expandDependencies: true,
      libraries: ['requests'],
      locator: { resolve },
    });

    expect(resolve).toHaveBeenCalledTimes(1);
    expect(resolve).toHaveBeenCalledWith('requests', 'python');
    expect(snapshot.dependencies.map(d => d.name)).toEqual(['requests']);
    expect(warnings).toEqual([]);
  });

  it('should expand each install path once per run', () => {
    write('proj/c.py', 'import alpha\n');
    write('site/alpha/mod.py', 'import beta\n');
    write('site/beta/mod.py', 'import alpha\n');

    const { snapshot } = orchestrator.run({
      rootPath: projectDir,
      rules: [],
      sink: new MemorySink(),
      fileTypes: ['.py'],
      expandDependencies: true,
      maxDepth: 5,
      libraries: ['alpha'],
      locator: locatorFor({
        alpha: path.join(tempDir, 'site', 'alpha'),
        beta: path.join(tempDir, 'site', 'beta'),
      }),
    });

    const [alpha] = snapshot.dependencies;
    expect(snapshot.dependencies.map(d => d.name)).toEqual(['alpha']);
    expect(alpha.dependencies.map(d => d.name)).toEqual(['beta']);
    expect(alpha.dependencies[0].dependencies).toEqual([]);
    expect(alpha.dependencies[0].libraries[0]).toMatchObject({ name: 'alpha', installPath: path.join(tempDir, 'site', 'alpha') });
  });

  it('should report a library root that cannot be walked and carry on', () => {
    const missing = path.join(tempDir, 'site', 'gone');
    const { snapshot, warnings } = orchestrator.run({
      rootPath: projectDir,
      rules: [],
      sink: new MemorySink(),
      expandDependencies: true,
      libraries: ['requests'],
      locator: locatorFor({ requests: missing }),
    });

    expect(snapshot.dependencies).toEqual([]);
    expect(warnings).toEqual([{ type: 'read', path: missing, message: `Root directory does not exist: ${missing}` }]);
  });

  it('should pass walk warnings through', () => {
    write('proj/locked/c.py', 'import json\n');
    const locked = path.join(projectDir, 'locked');
    const walkerFs: WalkerFs = {
      readdirSync: (dir, options) => {
        if (dir === locked) throw new Error('EACCES: permission denied');
        return fs.readdirSync(dir, options);
      },
      statSync: filePath => fs.statSync(filePath),
      lstatSync: filePath => fs.lstatSync(filePath),
      readlinkSync: filePath => fs.readlinkSync(filePath),
    };

    const { snapshot, warnings } = orchestrator.run({
      rootPath: projectDir,
      rules: [],
      sink: new MemorySink(),
      walkerFs,
    });

    expect(warnings).toEqual([{ type: 'read', path: locked, message: 'EACCES: permission denied' }]);
    expect(snapshot.files.map(f => f.relativePath)).toEqual(['a.py', 'b.py', 'vendor/x.txt']);
  });

  it('should reject invalid options', () => {
    expect(() => orchestrator.run({ rootPath: projectDir, rules: [], sink: new MemorySink(), maxDepth: -1 }))
      .toThrow(ConfigError);
    expect(() => orchestrator.run({ rootPath: projectDir, rules: [], sink: new MemorySink(), expandDependencies: true }))
      .toThrow('Dependency expansion needs a library locator');
    expect(() => orchestrator.run({ rootPath: path.join(tempDir, 'nope'), rules: [], sink: new MemorySink() }))
      .toThrow(ConfigError);
  });

  it('should log its stages at debug level', () => {
    write('site/requests/__init__.py', 'import urllib3\n');
    const stageLog = jest.spyOn(loggerModule, 'stageLog');

    try {
      orchestrator.run({
        rootPath: projectDir,
        rules: [],
        sink: new MemorySink(),
        expandDependencies: true,
        locator: locatorFor({ requests: path.join(tempDir, 'site', 'requests') }),
      });

      const messages = stageLog.mock.calls.map(([, message]) => message);
      expect(messages).toContain(`Scanning ${projectDir}`);
      expect(messages).toContain(`Expanding requests from ${path.join(tempDir, 'site', 'requests')}`);
      expect(stageLog.mock.calls.filter(([, , level]) => level !== 'debug')).toEqual([]);
    } finally {
      stageLog.mockRestore();
    }
  });

  it('should skip writing when constructed without a writer', () => {
    const sink = new MemorySink();
    new SnapshotOrchestrator(null).run({ rootPath: projectDir, rules: [], sink });
    expect(sink.keys()).toEqual(['codebase/a.py', 'codebase/b.py', 'codebase/vendor-x.txt']);
  });

  it('should survey file types and libraries without writing anything', () => {
    const survey = orchestrator.survey({ rootPath: projectDir, rules: [] });

    expect(survey.fileTypes).toEqual(['.py', '.txt']);
    expect(survey.libraries.map(l => l.name)).toEqual(['os', 'requests']);
    expect(survey.tree.name).toBe('proj');
    expect(survey.warnings).toEqual([]);
  });
});
