import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { DirectorySink, MemorySink, librarySink, safeName } from '../../src/extract/output-sink';

describe('MemorySink', () => {
  it('should key scoped writes by their scope path', () => {
    const sink = new MemorySink();
    sink.write('top.txt', 'top');
    sink.scope('codebase').write('a.py', Buffer.from('a'));
    librarySink(sink, '@acme/widgets').write('report.txt', 'r');

    expect(sink.keys()).toEqual(['codebase/a.py', 'libraries/@acme__widgets/report.txt', 'top.txt']);
    expect(sink.readText('codebase/a.py')).toBe('a');
  });

  it('should reject names with path separators', () => {
    const sink = new MemorySink();
    expect(() => sink.write('a/b.txt', '')).toThrow('Invalid output name');
    expect(() => sink.scope('..')).toThrow('Invalid output name');
    expect(() => sink.write('', '')).toThrow('Invalid output name');
  });
});

describe('DirectorySink', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'codesnap-sink-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should create directories lazily on first write', () => {
    const sink = new DirectorySink(path.join(tempDir, 'run'));
    const codebase = sink.scope('codebase');
    expect(fs.existsSync(path.join(tempDir, 'run'))).toBe(false);

    codebase.write('a.py', 'print(1)\n');

    expect(codebase.location).toBe(path.join(tempDir, 'run', 'codebase'));
    expect(fs.readFileSync(path.join(tempDir, 'run', 'codebase', 'a.py'), 'utf-8')).toBe('print(1)\n');
  });
});

describe('safeName', () => {
  it('should collapse separators into double underscores', () => {
    expect(safeName('@scope/pkg')).toBe('@scope__pkg');
    expect(safeName('github.com/user/repo')).toBe('github.com__user__repo');
    expect(safeName('std::io')).toBe('std__io');
    expect(safeName('requests')).toBe('requests');
  });
});
