import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, writeFileSync, rmSync, symlinkSync } from 'fs';
import { join, basename } from 'path';
import { tmpdir } from 'os';
import {
  buildSnapshot,
  validateRoot,
  formatStats,
  TRUNCATION_MARKER,
} from '../../../src/context/index.js';
import { resolveOptions, type SnapshotConfig } from '../../../src/config/options.js';

function createFixture(name: string): string {
  const root = join(tmpdir(), `snapshot-build-test-${name}-${Date.now()}`);
  mkdirSync(root, { recursive: true });
  return root;
}

function snapshot(root: string, config: SnapshotConfig = {}) {
  return buildSnapshot(resolveOptions({ root, ...config }));
}

// ─── validateRoot ───────────────────────────────────────────────────────────

describe('validateRoot', () => {
  it('throws for a missing path', () => {
    expect(() => validateRoot('/nonexistent/snapshot/root')).toThrow('Path does not exist');
  });

  it('throws for a file', () => {
    const root = createFixture('validate');
    writeFileSync(join(root, 'f.py'), 'x');
    try {
      expect(() => validateRoot(join(root, 'f.py'))).toThrow('Path is not a directory');
    } finally {
      rmSync(root, { recursive: true, force: true });
    }
  });
});

// ─── Stats footer ───────────────────────────────────────────────────────────

describe('formatStats', () => {
  const stats = { filesIncluded: 3, filesTruncated: 1, filesSkipped: 2 };

  it('omits the truncation line without a byte cap', () => {
    expect(formatStats(stats, 0)).toBe(
      '---\n## Snapshot Stats\n- files_included: 3\n- files_skipped_as_binary_or_unreadable: 2\n'
    );
  });

  it('reports truncation with a byte cap', () => {
    expect(formatStats(stats, 100)).toBe(
      '---\n## Snapshot Stats\n- files_included: 3\n- files_truncated_by_bytes: 1\n- files_skipped_as_binary_or_unreadable: 2\n'
    );
  });
});

// ─── buildSnapshot ──────────────────────────────────────────────────────────

describe('buildSnapshot: text, binary and hidden files', () => {
  let fixture: string;

  beforeEach(() => {
    fixture = createFixture('basic');
    mkdirSync(join(fixture, '.git'), { recursive: true });
    writeFileSync(join(fixture, 'a.py'), 'print(1)');
    writeFileSync(join(fixture, 'b.bin'), Buffer.from([0x00, 0x01, 0x02]));
    writeFileSync(join(fixture, '.git', 'ignored.py'), 'print("hidden")');
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
  });

  it('emits only a.py with default options', () => {
    const result = snapshot(fixture);
    const name = basename(fixture);

    expect(result.tree).toBe(`${name}\n\`-- a.py`);
    expect(result.markdown).toBe(
      '# Project Snapshot\n' +
      '## Directory Tree\n' +
      '```text\n' +
      `${name}\n\`-- a.py` +
      '\n```\n\n' +
      '## a.py\n```python\nprint(1)\n```\n\n' +
      '---\n## Snapshot Stats\n' +
      '- files_included: 1\n' +
      '- files_skipped_as_binary_or_unreadable: 0\n'
    );
  });

  it('counts a selected binary file as skipped and omits its section', () => {
    const result = snapshot(fixture, { includeExts: ['.py', '.bin'] });
    const name = basename(fixture);

    expect(result.tree).toBe(`${name}\n|-- a.py\n\`-- b.bin`);
    expect(result.markdown).not.toContain('## b.bin');
    expect(result.markdown).toContain('## a.py\n```python\nprint(1)\n```\n\n');
    expect(result.markdown).toContain('- files_included: 1\n- files_skipped_as_binary_or_unreadable: 1\n');
    expect(result.stats).toEqual({ filesIncluded: 1, filesTruncated: 0, filesSkipped: 1 });
    expect(result.skippedFiles).toEqual(['b.bin']);
  });

  it('never emits files from hidden directories', () => {
    const result = snapshot(fixture);
    expect(result.markdown).not.toContain('ignored.py');
    expect(result.markdown).not.toContain('hidden');
  });

  it('omits the footer when stats are off', () => {
    const result = snapshot(fixture, { showStats: false });
    expect(result.markdown.endsWith('## a.py\n```python\nprint(1)\n```\n\n')).toBe(true);
  });

  it('is byte-identical across runs', () => {
    expect(snapshot(fixture).markdown).toBe(snapshot(fixture).markdown);
  });
});

describe('buildSnapshot: truncation', () => {
  let fixture: string;

  beforeEach(() => {
    fixture = createFixture('truncate');
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
  });

  it('keeps the first and last sampled lines around the marker', () => {
    // 15 bytes; a 14-byte cap samples all of it but still marks it truncated
    writeFileSync(join(fixture, 'big.py'), 'l1\nl2\nl3\nl4\nl5\n');

    const result = snapshot(fixture, { maxBytes: 14, headLines: 1, tailLines: 1 });

    expect(result.markdown).toContain(`## big.py\n\`\`\`python\nl1\n\n${TRUNCATION_MARKER}\n\nl5\n\`\`\`\n\n`);
    expect(result.stats.filesTruncated).toBe(1);
  });

  it('shapes only the byte-capped sample', () => {
    writeFileSync(join(fixture, 'big.py'), 'l1\nl2\nl3\nl4\nl5\nl6\nl7\nl8\nl9\nl10\n');
    writeFileSync(join(fixture, 'small.py'), 'ok\n');

    const result = snapshot(fixture, { maxBytes: 10, headLines: 1, tailLines: 1 });
    const name = basename(fixture);

    expect(result.markdown).toBe(
      '# Project Snapshot\n' +
      '## Directory Tree\n' +
      '```text\n' +
      `${name}\n|-- big.py\n\`-- small.py` +
      '\n```\n\n' +
      `## big.py\n\`\`\`python\nl1\n\n${TRUNCATION_MARKER}\n\nl4\n\`\`\`\n\n` +
      '## small.py\n```python\nok\n```\n\n' +
      '---\n## Snapshot Stats\n' +
      '- files_included: 2\n' +
      '- files_truncated_by_bytes: 1\n' +
      '- files_skipped_as_binary_or_unreadable: 0\n'
    );
    expect(result.files).toEqual([
      { relativePath: 'big.py', language: 'python', size: 31, truncated: true },
      { relativePath: 'small.py', language: 'python', size: 3, truncated: false },
    ]);
  });

  it('passes the sample through unshaped when head and tail are zero', () => {
    writeFileSync(join(fixture, 'long.py'), 'abcdefghijklmnop');

    const result = snapshot(fixture, { maxBytes: 10, headLines: 0, tailLines: 0 });

    expect(result.markdown).toContain('## long.py\n```python\nabcdefghijk\n```\n\n');
    expect(result.markdown).not.toContain(TRUNCATION_MARKER);
    expect(result.stats.filesTruncated).toBe(1);
  });

  it('never counts files at or under the cap', () => {
    writeFileSync(join(fixture, 'exact.py'), '0123456789');

    const result = snapshot(fixture, { maxBytes: 10 });

    expect(result.stats.filesTruncated).toBe(0);
    expect(result.markdown).toContain('- files_truncated_by_bytes: 0\n');
  });
});

describe('buildSnapshot: selection and ordering', () => {
  let fixture: string;

  beforeEach(() => {
    fixture = createFixture('order');
    mkdirSync(join(fixture, 'c'), { recursive: true });
    mkdirSync(join(fixture, 'vendor'), { recursive: true });
    writeFileSync(join(fixture, 'B.py'), 'b = 2');
    writeFileSync(join(fixture, 'a.py'), 'a = 1');
    writeFileSync(join(fixture, 'c', 'd.py'), 'd = 4');
    writeFileSync(join(fixture, 'vendor', 'lib.py'), 'vendored = True');
    writeFileSync(join(fixture, 'readme.md'), '# readme');
    writeFileSync(join(fixture, 'pad.py'), '\n\nx = 1\n\n');
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('emits each file once, in case-insensitive path order', () => {
    const result = snapshot(fixture);
    const titles = result.markdown.split('\n').filter(l => l.startsWith('## ') && l !== '## Directory Tree' && l !== '## Snapshot Stats');

    expect(titles).toEqual(['## a.py', '## B.py', '## c/d.py', '## pad.py', '## vendor/lib.py']);
  });

  it('never emits files with extensions outside the include set', () => {
    const result = snapshot(fixture);
    expect(result.markdown).not.toContain('readme.md');
    expect(result.excludedFiles).toEqual([{ path: 'readme.md', reason: 'extension' }]);
  });

  it('prunes excluded directories even when a glob would include them', () => {
    const result = snapshot(fixture, { excludeDirs: ['vendor'], includeGlobs: ['vendor/*'] });

    expect(result.markdown).not.toContain('vendored');
    expect(result.tree).not.toContain('vendor');
    expect(result.files).toEqual([]);
  });

  it('strips blank lines around file content', () => {
    const result = snapshot(fixture);
    expect(result.markdown).toContain('## pad.py\n```python\nx = 1\n```\n\n');
  });

  it('leaves the fence tag empty for unknown extensions', () => {
    writeFileSync(join(fixture, 'Makefile'), 'all:\n\techo hi\n');
    const result = snapshot(fixture);
    expect(result.markdown).toContain('## Makefile\n```\nall:\n\techo hi\n```\n\n');
  });

  it('emits shell scripts with an empty fence tag', () => {
    writeFileSync(join(fixture, 'run.sh'), 'echo hi\n');
    const result = snapshot(fixture);
    expect(result.markdown).toContain('## run.sh\n```\necho hi\n```\n\n');
  });

  it('applies .gitignore lines only when asked', () => {
    writeFileSync(join(fixture, '.gitignore'), '# generated\nc/*\n');

    const without = snapshot(fixture);
    const withGitignore = snapshot(fixture, { respectGitignore: true });

    expect(without.markdown).toContain('## c/d.py');
    expect(withGitignore.markdown).not.toContain('## c/d.py');
    expect(withGitignore.gitignorePatterns).toEqual(['c/*']);
    // the .gitignore itself has no extension and is emitted like any other file
    expect(withGitignore.markdown).toContain('## .gitignore\n```\n# generated\nc/*\n```\n\n');
  });

  it('keeps going when a .gitignore line has a reversed range', () => {
    writeFileSync(join(fixture, '.gitignore'), '[9-0]*.log\nc/*\n');

    const result = snapshot(fixture, { respectGitignore: true });

    expect(result.gitignorePatterns).toEqual(['[9-0]*.log', 'c/*']);
    expect(result.markdown).not.toContain('## c/d.py');
    expect(result.markdown).toContain('## pad.py\n');
  });

  it('counts an unreadable file as skipped and keeps going', () => {
    symlinkSync(join(fixture, 'does-not-exist.py'), join(fixture, 'ghost.py'));

    const result = snapshot(fixture);

    expect(result.tree).toContain('ghost.py');
    expect(result.markdown).not.toContain('## ghost.py');
    expect(result.stats.filesSkipped).toBe(1);
    expect(result.stats.filesIncluded).toBe(5);
  });

  it('logs progress when verbose', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

    buildSnapshot(resolveOptions({ root: fixture }), { verbose: true });

    expect(spy).toHaveBeenCalledWith('  Skipped 0 binary/unreadable, truncated 0');
  });

  it('throws for a missing root', () => {
    expect(() => snapshot(join(fixture, 'missing'))).toThrow('Path does not exist');
  });
});
