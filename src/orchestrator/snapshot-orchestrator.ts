import * as fs from 'node:fs';
import * as path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import type {
  Clock,
  DirectoryTreeNode,
  IgnoreRule,
  LibraryReference,
  Snapshot,
  SnapshotResult,
  SnapshotWarning,
} from '../types';
import { PathFilter } from '../scanner/path-filter';
import { TreeWalker, countFiles, type WalkerFs } from '../scanner/tree-walker';
import { CodemapRenderer } from '../render/codemap-renderer';
import { CodebaseExtractor, listFileTypes } from '../extract/codebase-extractor';
import { CODEBASE_SCOPE, MemorySink, librarySink, type OutputSink } from '../extract/output-sink';
import { DependencyAnalyzer } from '../dependencies/dependency-analyzer';
import { LocalModuleIndex } from '../dependencies/local-modules';
import { IMPORT_RULES, type LanguageImportRules } from '../dependencies/import-patterns';
import type { LibraryLocator } from '../dependencies/library-locator';
import { ReportWriter, type SnapshotWriter } from '../report/report-writer';
import { ConfigError, readWarning } from '../utils/errors';
import { stageLog, warningLog } from '../utils/logger';

export interface SnapshotOptions {
  rootPath: string;
  rules: readonly IgnoreRule[];
  sink: OutputSink;
  /** Repeat the snapshot for each installed library (off by default). */
  expandDependencies?: boolean;
  maxDepth?: number;
  /** Restricts resolution and expansion of the project's own libraries to these names. */
  libraries?: readonly string[];
  fileTypes?: readonly string[];
  locator?: LibraryLocator;
  importRules?: readonly LanguageImportRules[];
  clock?: Clock;
  walkerFs?: WalkerFs;
  readFile?: (filePath: string) => Buffer;
}

interface RunContext {
  runId: string;
  walker: TreeWalker;
  extractor: CodebaseExtractor;
  analyzer: DependencyAnalyzer;
  importRules: readonly LanguageImportRules[];
  options: SnapshotOptions;
  maxDepth: number;
  clock: Clock;
  expanded: Set<string>;
  warnings: SnapshotWarning[];
}

export interface Survey {
  tree: DirectoryTreeNode;
  fileTypes: string[];
  libraries: LibraryReference[];
  warnings: SnapshotWarning[];
}

const DEFAULT_MAX_DEPTH = 1;

function realPath(target: string): string {
  try {
    return fs.realpathSync(target);
  } catch {
    return path.resolve(target);
  }
}

export class SnapshotOrchestrator {
  private readonly renderer = new CodemapRenderer();

  constructor(private readonly writer: SnapshotWriter | null = new ReportWriter()) {}

  run(options: SnapshotOptions): SnapshotResult {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
      throw new ConfigError(`maxDepth must be a non-negative integer, got ${maxDepth}`, 'maxDepth', maxDepth);
    }
    if (options.expandDependencies && !options.locator) {
      throw new ConfigError('Dependency expansion needs a library locator', 'locator', undefined);
    }

    const filter = new PathFilter(options.rules);
    const clock = options.clock ?? (() => new Date());
    const importRules = options.importRules ?? IMPORT_RULES;
    const ctx: RunContext = {
      runId: uuidv4(),
      walker: new TreeWalker(filter, options.walkerFs),
      extractor: new CodebaseExtractor({ fileTypes: options.fileTypes, clock, readFile: options.readFile }),
      analyzer: new DependencyAnalyzer(importRules),
      importRules,
      options,
      maxDepth,
      clock,
      expanded: new Set([realPath(options.rootPath)]),
      warnings: [],
    };

    const rootPath = path.resolve(options.rootPath);
    const snapshot = this.snapshotOf(ctx, rootPath, path.basename(rootPath), 0, options.sink);

    if (this.writer) {
      stageLog('report', `Writing snapshot to ${options.sink.location}`, 'debug');
      this.writer.write(snapshot, options.sink);
    }

    return { snapshot, warnings: ctx.warnings };
  }

  /**
   * Walks and analyzes a project without writing anything, so a caller can
   * offer the file types and libraries it found before the real run.
   */
  survey(options: Pick<SnapshotOptions, 'rootPath' | 'rules' | 'importRules' | 'walkerFs' | 'readFile'>): Survey {
    const filter = new PathFilter(options.rules);
    const walked = new TreeWalker(filter, options.walkerFs).walk(options.rootPath);
    const extracted = new CodebaseExtractor({ readFile: options.readFile }).extract(walked.tree, new MemorySink());
    const importRules = options.importRules ?? IMPORT_RULES;
    const analyzer = new DependencyAnalyzer(importRules);
    const sources = extracted.files.map(f => ({ path: f.relativePath, content: f.content.toString('utf-8') }));

    return {
      tree: walked.tree,
      fileTypes: listFileTypes(walked.tree),
      libraries: analyzer.analyze(sources, LocalModuleIndex.fromTree(walked.tree, importRules, options.readFile)),
      warnings: [...walked.warnings, ...extracted.warnings],
    };
  }

  private snapshotOf(
    ctx: RunContext,
    rootPath: string,
    name: string,
    depth: number,
    sink: OutputSink,
  ): Snapshot {
    const createdAt = ctx.clock().toISOString();

    stageLog('walk', `Scanning ${rootPath}`, 'debug');
    const walked = ctx.walker.walk(rootPath);
    this.record(ctx, walked.warnings);

    stageLog('render', `Rendering codemap for ${name}`, 'debug');
    const codemap = this.renderer.render(walked.tree);

    stageLog('extract', `Extracting ${name}`, 'debug');
    const extracted = ctx.extractor.extract(walked.tree, sink.scope(CODEBASE_SCOPE));
    this.record(ctx, extracted.warnings);

    stageLog('dependencies', `Analyzing imports of ${name}`, 'debug');
    const sources = extracted.files.map(f => ({ path: f.relativePath, content: f.content.toString('utf-8') }));
    const local = LocalModuleIndex.fromTree(walked.tree, ctx.importRules, ctx.options.readFile);
    let libraries = ctx.analyzer.analyze(sources, local);

    const dependencies: Snapshot[] = [];
    if (ctx.options.expandDependencies && ctx.options.locator && depth < ctx.maxDepth) {
      const include = depth === 0 ? ctx.options.libraries : undefined;
      const resolved = ctx.analyzer.resolve(libraries, ctx.options.locator, include);
      this.record(ctx, resolved.warnings);
      libraries = resolved.libraries.map(lib => this.expand(ctx, lib, depth, sink, dependencies));
    }

    return {
      runId: ctx.runId,
      name,
      rootPath,
      depth,
      createdAt,
      tree: walked.tree,
      codemap,
      files: extracted.files,
      fileTypes: listFileTypes(walked.tree),
      libraries,
      dependencies,
    };
  }

  private expand(
    ctx: RunContext,
    lib: LibraryReference,
    depth: number,
    sink: OutputSink,
    dependencies: Snapshot[],
  ): LibraryReference {
    if (lib.installPath === undefined) return lib;

    const key = realPath(lib.installPath);
    if (ctx.expanded.has(key)) {
      stageLog('dependencies', `Skipping ${lib.name}: already expanded in this run`, 'debug');
      return lib;
    }
    ctx.expanded.add(key);

    stageLog('dependencies', `Expanding ${lib.name} from ${lib.installPath}`, 'debug');
    let nested: Snapshot;
    try {
      nested = this.snapshotOf(ctx, lib.installPath, lib.name, depth + 1, librarySink(sink, lib.name));
    } catch (error) {
      // a library root that cannot be walked is reported, not fatal
      if (!(error instanceof ConfigError)) throw error;
      this.record(ctx, [readWarning(lib.installPath, error)]);
      return lib;
    }
    dependencies.push(nested);

    const totals = countFiles(nested.tree);
    return { ...lib, fileCount: totals.files, totalSize: totals.bytes };
  }

  private record(ctx: RunContext, warnings: readonly SnapshotWarning[]): void {
    for (const warning of warnings) {
      warningLog(warning);
      ctx.warnings.push(warning);
    }
  }
}
