/**
 * Core type definitions for the codesnap snapshot engine.
 * These types define the contracts between all components.
 */

// ─── Ignore Rules ────────────────────────────────────────────────────────────

export type EntryKind = 'file' | 'directory';

export type IgnoreRuleKind = 'extension' | 'name' | 'glob';

export type IgnoreRuleScope = 'file' | 'directory' | 'both';

export interface IgnoreRule {
  readonly pattern: string;
  readonly kind: IgnoreRuleKind;
  readonly scope: IgnoreRuleScope;
}

// ─── Tree ────────────────────────────────────────────────────────────────────

export interface FileTreeNode {
  readonly kind: 'file';
  readonly name: string;
  readonly path: string;
  readonly relativePath: string;
  readonly size: number;
  /** Set when the entry is a symbolic link; the link itself is never followed. */
  readonly symlinkTarget?: string;
}

export interface DirectoryTreeNode {
  readonly kind: 'directory';
  readonly name: string;
  readonly path: string;
  readonly relativePath: string;
  readonly children: readonly TreeNode[];
}

export type TreeNode = FileTreeNode | DirectoryTreeNode;

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface ReadWarning {
  type: 'read';
  path: string;
  message: string;
}

export interface ResolutionWarning {
  type: 'resolution';
  library: string;
  message: string;
}

export type SnapshotWarning = ReadWarning | ResolutionWarning;

// ─── Extraction ──────────────────────────────────────────────────────────────

export interface ExtractedFile {
  sourcePath: string;
  relativePath: string;
  outputName: string;
  size: number;
  content: Buffer;
  /** ISO-8601 capture time. */
  capturedAt: string;
}

// ─── Dependencies ────────────────────────────────────────────────────────────

export interface LibraryReference {
  name: string;
  language: string;
  referencedBy: string[];
  installPath?: string;
  version?: string;
  fileCount?: number;
  totalSize?: number;
}

export interface SourceFile {
  path: string;
  content: string;
}

// ─── Snapshot ────────────────────────────────────────────────────────────────

export interface Snapshot {
  runId: string;
  name: string;
  rootPath: string;
  depth: number;
  createdAt: string;
  tree: DirectoryTreeNode;
  codemap: string;
  files: ExtractedFile[];
  fileTypes: string[];
  libraries: LibraryReference[];
  dependencies: Snapshot[];
}

export interface SnapshotResult {
  snapshot: Snapshot;
  warnings: SnapshotWarning[];
}

export type SnapshotStage = 'walk' | 'render' | 'extract' | 'dependencies' | 'report';

export type Clock = () => Date;
