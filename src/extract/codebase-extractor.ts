import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Clock, ExtractedFile, FileTreeNode, ReadWarning, TreeNode } from '../types';
import { readWarning } from '../utils/errors';
import { stageLog } from '../utils/logger';
import { collectFileNodes } from '../scanner/tree-walker';
import type { OutputSink } from './output-sink';

export interface ExtractorOptions {
  /** Extensions to extract; empty means every file. */
  fileTypes?: readonly string[];
  clock?: Clock;
  readFile?: (filePath: string) => Buffer;
}

export interface ExtractionResult {
  files: ExtractedFile[];
  warnings: ReadWarning[];
}

const HASH_LENGTH = 8;
const MAX_HASH_LENGTH = 40;
/** Names stay well under the 255-byte file name limit of common file systems. */
const MAX_NAME_BYTES = 200;
const MAX_EXTENSION_BYTES = 32;

/**
 * Flattens a relative path into an output name: `src/util/a.py` becomes
 * `src-util-a.py`.
 */
export function flattenPath(relativePath: string): string {
  return relativePath.split('/').filter(Boolean).join('-');
}

/** The longest tail of `text` that fits in `maxBytes` of UTF-8, without leading dashes. */
function tailWithin(text: string, maxBytes: number): string {
  const chars = [...text];
  let start = chars.length;
  let bytes = 0;
  while (start > 0) {
    const size = Buffer.byteLength(chars[start - 1]);
    if (bytes + size > maxBytes) break;
    bytes += size;
    start--;
  }
  return chars.slice(start).join('').replace(/^-+/, '');
}

function withHash(name: string, seed: string, length: number): string {
  const hash = crypto.createHash('sha1').update(seed).digest('hex').slice(0, length);
  let ext = path.extname(name);
  if (Buffer.byteLength(ext) > MAX_EXTENSION_BYTES) ext = '';
  const stem = ext ? name.slice(0, -ext.length) : name;
  const tail = tailWithin(stem, MAX_NAME_BYTES - Buffer.byteLength(`.${hash}${ext}`));
  return tail ? `${tail}.${hash}${ext}` : `${hash}${ext}`;
}

/**
 * Assigns collision-free output names for one run. The first file to claim a
 * flattened name keeps it; later claimants get a path-hash suffix before the
 * extension. Names compare case-insensitively so the result is also safe on
 * case-insensitive file systems.
 *
 * A flattened name longer than {@link MAX_NAME_BYTES} keeps only the tail of
 * its stem, followed by the path hash and the extension.
 */
export class OutputNamer {
  private readonly used = new Set<string>();

  assign(relativePath: string): string {
    const flat = flattenPath(relativePath);
    const nameFor = (length: number): string => {
      if (length === 0) return flat;
      // sha1 hex is 40 characters; past that the counter keeps the loop finite
      const seed = length > MAX_HASH_LENGTH ? `${relativePath}#${length}` : relativePath;
      return withHash(flat, seed, Math.min(length, MAX_HASH_LENGTH));
    };

    let length = Buffer.byteLength(flat) > MAX_NAME_BYTES ? HASH_LENGTH : 0;
    let name = nameFor(length);
    while (this.used.has(name.toLowerCase())) {
      length = length === 0 ? HASH_LENGTH : length + 4;
      name = nameFor(length);
    }
    this.used.add(name.toLowerCase());
    return name;
  }
}

export function listFileTypes(root: TreeNode): string[] {
  const types = new Set<string>();
  for (const file of collectFileNodes(root)) {
    const ext = path.extname(file.name).toLowerCase();
    if (ext) types.add(ext);
  }
  return [...types].sort();
}

export class CodebaseExtractor {
  private readonly fileTypes: Set<string>;
  private readonly clock: Clock;
  private readonly readFile: (filePath: string) => Buffer;

  constructor(options: ExtractorOptions = {}) {
    this.fileTypes = new Set((options.fileTypes ?? []).map(t => t.toLowerCase()));
    this.clock = options.clock ?? (() => new Date());
    this.readFile = options.readFile ?? (filePath => fs.readFileSync(filePath));
  }

  extract(root: TreeNode, sink: OutputSink): ExtractionResult {
    const files: ExtractedFile[] = [];
    const warnings: ReadWarning[] = [];
    const namer = new OutputNamer();

    for (const node of collectFileNodes(root)) {
      if (!this.shouldExtract(node)) continue;

      let content: Buffer;
      try {
        content = this.readFile(node.path);
      } catch (error) {
        warnings.push(readWarning(node.path, error));
        continue;
      }

      const relativePath = node.relativePath || node.name;
      const outputName = namer.assign(relativePath);
      try {
        sink.write(outputName, content);
      } catch (error) {
        warnings.push(readWarning(node.path, error));
        continue;
      }

      files.push({
        sourcePath: node.path,
        relativePath,
        outputName,
        size: content.length,
        content,
        capturedAt: this.clock().toISOString(),
      });
    }

    stageLog('extract', `Extracted ${files.length} file(s) to ${sink.location}`, 'debug');
    return { files, warnings };
  }

  private shouldExtract(node: FileTreeNode): boolean {
    if (node.symlinkTarget !== undefined) return false;
    if (this.fileTypes.size === 0) return true;
    return this.fileTypes.has(path.extname(node.name).toLowerCase());
  }
}
