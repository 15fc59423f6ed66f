import type { LibraryReference, Snapshot } from '../types';
import { CodemapRenderer, formatSize } from '../render/codemap-renderer';
import { librarySink, safeName, type OutputSink } from '../extract/output-sink';
import { stageLog } from '../utils/logger';

/** Receives a finished snapshot and persists it. */
export interface SnapshotWriter {
  write(snapshot: Snapshot, sink: OutputSink): void;
}

export interface ManifestEntry {
  source: string;
  output: string;
  size: number;
  capturedAt: string;
}

export interface SnapshotManifest {
  runId: string;
  name: string;
  rootPath: string;
  depth: number;
  createdAt: string;
  fileTypes: string[];
  files: ManifestEntry[];
  dependencies: string[];
}

export interface DependencyReportEntry {
  name: string;
  language: string;
  referencedBy: string[];
  installPath: string;
  version: string | null;
  fileCount: number | null;
  totalSize: number | null;
}

export class ReportWriter implements SnapshotWriter {
  private readonly renderer = new CodemapRenderer();

  write(snapshot: Snapshot, sink: OutputSink): void {
    const base = safeName(snapshot.name);

    sink.write(`${base}-codemap.txt`, `${snapshot.codemap}\n${this.renderer.renderLibraries(snapshot.libraries)}`);
    sink.write(`${base}-manifest.json`, `${JSON.stringify(this.buildManifest(snapshot), null, 2)}\n`);
    sink.write('dependency-report.txt', this.generateDependencyReport(snapshot));
    sink.write(
      'dependency-report.json',
      `${JSON.stringify(snapshot.libraries.map(lib => this.toReportEntry(lib)), null, 2)}\n`,
    );
    stageLog('report', `Wrote ${snapshot.name} report to ${sink.location}`, 'debug');

    for (const dependency of snapshot.dependencies) {
      this.write(dependency, librarySink(sink, dependency.name));
    }
  }

  buildManifest(snapshot: Snapshot): SnapshotManifest {
    return {
      runId: snapshot.runId,
      name: snapshot.name,
      rootPath: snapshot.rootPath,
      depth: snapshot.depth,
      createdAt: snapshot.createdAt,
      fileTypes: snapshot.fileTypes,
      files: snapshot.files.map(f => ({
        source: f.relativePath,
        output: f.outputName,
        size: f.size,
        capturedAt: f.capturedAt,
      })),
      dependencies: snapshot.dependencies.map(d => d.name),
    };
  }

  generateDependencyReport(snapshot: Snapshot): string {
    const s: string[] = [];
    s.push(`Dependency report: ${snapshot.name}`);
    s.push(`Generated: ${snapshot.createdAt}`);
    s.push('');

    if (snapshot.libraries.length === 0) {
      s.push('No libraries detected.');
    }

    for (const lib of snapshot.libraries) {
      s.push(lib.version ? `${lib.name} (v${lib.version})` : lib.name);
      s.push(`  Language: ${lib.language}`);
      s.push(`  Install path: ${lib.installPath ?? 'unresolved'}`);
      if (lib.fileCount !== undefined && lib.totalSize !== undefined) {
        s.push(`  Files: ${lib.fileCount} (${formatSize(lib.totalSize)})`);
      }
      s.push(`  Referenced by: ${lib.referencedBy.join(', ')}`);
    }

    return `${s.join('\n')}\n`;
  }

  private toReportEntry(lib: LibraryReference): DependencyReportEntry {
    return {
      name: lib.name,
      language: lib.language,
      referencedBy: lib.referencedBy,
      installPath: lib.installPath ?? 'unresolved',
      version: lib.version ?? null,
      fileCount: lib.fileCount ?? null,
      totalSize: lib.totalSize ?? null,
    };
  }
}
