import * as path from 'node:path';
import { PathFilter } from '../../src/scanner/path-filter';
import { extensionRule, globRule, nameRule, parseIgnoreLine } from '../../src/scanner/ignore-rules';
import { ConfigError } from '../../src/utils/errors';

const ROOT = path.resolve('/projects/demo');

function at(relative: string): string {
  return path.join(ROOT, relative);
}

describe('PathFilter', () => {
  it('should include everything with no rules', () => {
    const filter = new PathFilter([]);
    expect(filter.included(at('src/a.ts'), 'file', ROOT)).toBe(true);
    expect(filter.included(at('node_modules'), 'directory', ROOT)).toBe(true);
  });

  it('should match extensions case-insensitively', () => {
    const filter = new PathFilter([extensionRule('*.txt')]);
    expect(filter.included(at('notes.TXT'), 'file', ROOT)).toBe(false);
    expect(filter.included(at('notes.md'), 'file', ROOT)).toBe(true);
  });

  it('should not apply extension rules to directories', () => {
    const filter = new PathFilter([extensionRule('.d')]);
    expect(filter.included(at('conf.d'), 'directory', ROOT)).toBe(true);
    expect(filter.included(at('conf.d'), 'file', ROOT)).toBe(false);
  });

  it('should not treat a file named exactly like the extension as matching it', () => {
    const filter = new PathFilter([extensionRule('.env')]);
    expect(filter.included(at('.env'), 'file', ROOT)).toBe(true);
    expect(filter.included(at('prod.env'), 'file', ROOT)).toBe(false);
  });

  it('should match multi-part extensions', () => {
    const filter = new PathFilter([extensionRule('.min.js')]);
    expect(filter.included(at('vendor.min.js'), 'file', ROOT)).toBe(false);
    expect(filter.included(at('vendor.js'), 'file', ROOT)).toBe(true);
  });

  it('should respect name rule scopes', () => {
    const filter = new PathFilter([nameRule('build', 'directory'), nameRule('TODO', 'file')]);
    expect(filter.included(at('build'), 'directory', ROOT)).toBe(false);
    expect(filter.included(at('build'), 'file', ROOT)).toBe(true);
    expect(filter.included(at('TODO'), 'file', ROOT)).toBe(false);
    expect(filter.included(at('TODO'), 'directory', ROOT)).toBe(true);
  });

  it('should compare names exactly', () => {
    const filter = new PathFilter([nameRule('Build')]);
    expect(filter.included(at('build'), 'directory', ROOT)).toBe(true);
    expect(filter.included(at('Build'), 'directory', ROOT)).toBe(false);
  });

  it('should match globs against the path relative to the root', () => {
    const filter = new PathFilter([globRule('docs/*.md')]);
    expect(filter.included(at('docs/guide.md'), 'file', ROOT)).toBe(false);
    expect(filter.included(at('src/docs/guide.md'), 'file', ROOT)).toBe(true);
    expect(filter.included(at('README.md'), 'file', ROOT)).toBe(true);
  });

  it('should match directory-only globs against directories', () => {
    const filter = new PathFilter(parseIgnoreLine('/codesnap-output/'));
    expect(filter.included(at('codesnap-output'), 'directory', ROOT)).toBe(false);
    expect(filter.included(at('src/codesnap-output'), 'directory', ROOT)).toBe(true);
  });

  it('should match globs against the base name when no root is given', () => {
    const filter = new PathFilter([globRule('test_*')]);
    expect(filter.included(at('src/test_walker.py'), 'file')).toBe(false);
    expect(filter.included(at('src/walker.py'), 'file')).toBe(true);
  });

  it('should ignore globs for entries outside the root', () => {
    const filter = new PathFilter([globRule('*.py')]);
    expect(filter.included(path.resolve('/elsewhere/a.py'), 'file', ROOT)).toBe(true);
  });

  it('should reject invalid rules at construction', () => {
    expect(() => new PathFilter([{ pattern: 'txt', kind: 'extension', scope: 'file' }])).toThrow(ConfigError);
  });
});
