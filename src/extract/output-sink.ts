import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Destination for named payloads. Names are flat; nesting goes through
 * `scope`, so a single scope never holds subdirectories of its own.
 */
export interface OutputSink {
  readonly location: string;
  write(name: string, data: string | Buffer): void;
  scope(name: string): OutputSink;
}

function assertFlatName(name: string): void {
  if (!name || name === '.' || name === '..' || /[\\/]/.test(name)) {
    throw new Error(`Invalid output name "${name}": names must not contain path separators`);
  }
}

export class DirectorySink implements OutputSink {
  readonly location: string;

  constructor(directory: string) {
    this.location = path.resolve(directory);
  }

  write(name: string, data: string | Buffer): void {
    assertFlatName(name);
    if (!fs.existsSync(this.location)) {
      fs.mkdirSync(this.location, { recursive: true });
    }
    fs.writeFileSync(path.join(this.location, name), data);
  }

  scope(name: string): OutputSink {
    assertFlatName(name);
    return new DirectorySink(path.join(this.location, name));
  }
}

export class MemorySink implements OutputSink {
  constructor(
    readonly location: string = '',
    private readonly store: Map<string, Buffer> = new Map(),
  ) {}

  write(name: string, data: string | Buffer): void {
    assertFlatName(name);
    this.store.set(this.key(name), typeof data === 'string' ? Buffer.from(data, 'utf-8') : Buffer.from(data));
  }

  scope(name: string): OutputSink {
    assertFlatName(name);
    return new MemorySink(this.key(name), this.store);
  }

  read(key: string): Buffer | undefined {
    return this.store.get(key);
  }

  readText(key: string): string | undefined {
    return this.store.get(key)?.toString('utf-8');
  }

  keys(): string[] {
    return [...this.store.keys()].sort();
  }

  private key(name: string): string {
    return this.location ? `${this.location}/${name}` : name;
  }
}

// ─── Snapshot layout ────────────────────────────────────────────────────────

export const CODEBASE_SCOPE = 'codebase';
export const LIBRARIES_SCOPE = 'libraries';

/** `@scope/pkg` and `github.com/a/b` become single path segments. */
export function safeName(name: string): string {
  return name.replace(/[\\/:]+/g, '__');
}

export function librarySink(sink: OutputSink, library: string): OutputSink {
  return sink.scope(LIBRARIES_SCOPE).scope(safeName(library));
}
