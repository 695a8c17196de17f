import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  compareSteps,
  discoverSteps,
  findDuplicatePrefixes,
  parsePrefix,
  type PipelineStep,
} from './discoverer.js';
import { configureLogging, resetLogging, type LogEntry } from './logger.js';
import { DirectoryNotFoundError, DuplicatePrefixError } from './pipeline-error.js';
import { createMemoryFs } from '../testing/fakes.js';

const ROOT = '/pipeline';

function filenames(steps: readonly PipelineStep[]): string[] {
  return steps.map((s) => s.filename);
}

// ---------------------------------------------------------------------------
// parsePrefix
// ---------------------------------------------------------------------------

describe('parsePrefix', () => {
  it.each([
    ['1-transfer_data.sh', 1, 'transfer_data.sh'],
    ['10_build.hql', 10, 'build.hql'],
    ['3.load.py', 3, 'load.py'],
    ['007-x.sh', 7, 'x.sh'],
    ['0-init.sh', 0, 'init.sh'],
  ])('parses %s', (name, order, rest) => {
    expect(parsePrefix(name)).toEqual({ order, rest });
  });

  it.each([
    'myproject.py',
    'random.txt',
    'image.jpeg',
    '4a.py',
    '5-',
    '-1-a.py',
    'x-1.sh',
    '12',
    '1 a.sh',
  ])('rejects %s', (name) => {
    expect(parsePrefix(name)).toBeNull();
  });

  it('rejects prefixes beyond the safe integer range', () => {
    expect(parsePrefix('99999999999999999999-x.sh')).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// compareSteps / findDuplicatePrefixes
// ---------------------------------------------------------------------------

describe('compareSteps', () => {
  const step = (order: number, filename: string): PipelineStep => ({
    order,
    filename,
    filepath: join(ROOT, filename),
  });

  it('orders numerically, not lexically', () => {
    const sorted = [step(10, '10-c.py'), step(2, '2-b.py'), step(1, '1-a.sh')].sort(compareSteps);
    expect(filenames(sorted)).toEqual(['1-a.sh', '2-b.py', '10-c.py']);
  });

  it('breaks ties by filename', () => {
    const sorted = [step(2, '2-y.py'), step(2, '02-x.py')].sort(compareSteps);
    expect(filenames(sorted)).toEqual(['02-x.py', '2-y.py']);
  });

  it('compares filenames by code unit', () => {
    const sorted = [step(1, '1-b.sh'), step(1, '1-B.sh')].sort(compareSteps);
    expect(filenames(sorted)).toEqual(['1-B.sh', '1-b.sh']);
  });

  it('finds prefixes used more than once', () => {
    const steps = [step(1, '1-a.sh'), step(2, '02-x.py'), step(2, '2-y.py'), step(3, '3-c.R')];
    expect(findDuplicatePrefixes(steps)).toEqual(new Map([[2, ['02-x.py', '2-y.py']]]));
  });
});

// ---------------------------------------------------------------------------
// discoverSteps (memory filesystem)
// ---------------------------------------------------------------------------

describe('discoverSteps', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    configureLogging({ level: 'debug', sink: (entry) => entries.push(entry) });
  });

  afterEach(() => {
    resetLogging();
  });

  it('returns steps in prefix order regardless of listing order', () => {
    const fs = createMemoryFs(ROOT, { '10-c.py': 'file', '2-b.py': 'file', '1-a.sh': 'file' });
    const steps = discoverSteps(ROOT, { fs });

    expect(steps).toEqual([
      { order: 1, filename: '1-a.sh', filepath: '/pipeline/1-a.sh' },
      { order: 2, filename: '2-b.py', filepath: '/pipeline/2-b.py' },
      { order: 10, filename: '10-c.py', filepath: '/pipeline/10-c.py' },
    ]);
  });

  it('ignores files without a prefix', () => {
    const fs = createMemoryFs(ROOT, {
      'myproject.py': 'file',
      'random.txt': 'file',
      'image.jpeg': 'file',
      '1-transfer_data.sh': 'file',
    });
    expect(filenames(discoverSteps(ROOT, { fs }))).toEqual(['1-transfer_data.sh']);
  });

  it('accepts -, _ and . as separators', () => {
    const fs = createMemoryFs(ROOT, { '3-c.py': 'file', '2.b.py': 'file', '1_a.py': 'file' });
    expect(filenames(discoverSteps(ROOT, { fs }))).toEqual(['1_a.py', '2.b.py', '3-c.py']);
  });

  it('runs duplicate prefixes in filename order by default', () => {
    const fs = createMemoryFs(ROOT, { '2-y.py': 'file', '1-a.sh': 'file', '02-x.py': 'file' });
    const steps = discoverSteps(ROOT, { fs });

    expect(filenames(steps)).toEqual(['1-a.sh', '02-x.py', '2-y.py']);
    const warning = entries.find((e) => e.msg === 'steps share a prefix, running them by filename');
    expect(warning?.level).toBe('info');
    expect(warning?.order).toBe(2);
    expect(warning?.meta).toEqual({ files: ['02-x.py', '2-y.py'] });
  });

  it('refuses duplicate prefixes under the error policy', () => {
    const fs = createMemoryFs(ROOT, { '2-y.py': 'file', '02-x.py': 'file' });
    expect(() => discoverSteps(ROOT, { fs, duplicatePrefix: 'error' })).toThrow(
      new DuplicatePrefixError(2, ['02-x.py', '2-y.py']).message,
    );
  });

  it('leaves out prefixed directories and special files', () => {
    const fs = createMemoryFs(ROOT, {
      '1-a.sh': 'file',
      '2-outputs': 'directory',
      '3-fifo.sh': 'other',
    });
    expect(filenames(discoverSteps(ROOT, { fs }))).toEqual(['1-a.sh']);
  });

  it('skips entries that cannot be stat-ed', () => {
    const fs = createMemoryFs(ROOT, { '1-a.sh': 'file' }, { dangling: ['2-gone.sh'] });
    expect(filenames(discoverSteps(ROOT, { fs }))).toEqual(['1-a.sh']);
    expect(entries.find((e) => e.msg === 'skipping entry that cannot be stat-ed')?.file).toBe('2-gone.sh');
  });

  it('logs prefixed files whose prefix is too large and leaves them out', () => {
    const fs = createMemoryFs(ROOT, { '99999999999999999999-x.sh': 'file', '1-a.sh': 'file', 'notes.txt': 'file' });

    expect(filenames(discoverSteps(ROOT, { fs }))).toEqual(['1-a.sh']);
    const skipped = entries.filter((e) => e.msg === 'skipping entry whose prefix is too large');
    expect(skipped.map((e) => [e.level, e.file])).toEqual([['debug', '99999999999999999999-x.sh']]);
  });

  it('returns an empty list when nothing matches', () => {
    const fs = createMemoryFs(ROOT, { 'README.md': 'file' });
    expect(discoverSteps(ROOT, { fs })).toEqual([]);
  });

  it('returns the same steps on every call', () => {
    const fs = createMemoryFs(ROOT, { '3-c.R': 'file', '1-a.sh': 'file', '2-b.py': 'file' });
    expect(discoverSteps(ROOT, { fs })).toEqual(discoverSteps(ROOT, { fs }));
  });

  it('returns frozen steps', () => {
    const fs = createMemoryFs(ROOT, { '1-a.sh': 'file' });
    expect(Object.isFrozen(discoverSteps(ROOT, { fs })[0])).toBe(true);
  });

  // -----------------------------------------------------------------------
  // Directory errors
  // -----------------------------------------------------------------------

  describe('directory errors', () => {
    function discoverError(fs: ReturnType<typeof createMemoryFs>): DirectoryNotFoundError {
      try {
        discoverSteps(ROOT, { fs });
      } catch (err) {
        if (err instanceof DirectoryNotFoundError) return err;
        throw err;
      }
      throw new Error('expected DirectoryNotFoundError');
    }

    it('reports a missing directory', () => {
      const err = discoverError(createMemoryFs(ROOT, {}, { rootKind: 'missing' }));
      expect(err.reason).toBe('missing');
      expect(err.message).toBe('Pipeline directory /pipeline does not exist');
    });

    it('reports a path that is not a directory', () => {
      const err = discoverError(createMemoryFs(ROOT, {}, { rootKind: 'file' }));
      expect(err.reason).toBe('not-a-directory');
    });

    it('reports a directory that cannot be listed', () => {
      const err = discoverError(createMemoryFs(ROOT, {}, { readdirError: 'EACCES' }));
      expect(err.reason).toBe('unreadable');
      expect(err.message).toBe('Pipeline directory /pipeline cannot be read');
    });
  });
});

// ---------------------------------------------------------------------------
// discoverSteps (real filesystem)
// ---------------------------------------------------------------------------

describe('discoverSteps on disk', () => {
  let testRoot: string;

  beforeEach(() => {
    testRoot = join(tmpdir(), `prefixrun-discover-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testRoot, { recursive: true });
  });

  afterEach(() => {
    rmSync(testRoot, { recursive: true, force: true });
  });

  it('finds prefixed regular files and skips the rest', () => {
    for (const name of ['3-pull_ingest.py', '1-transfer_data.sh', '2-build_tables.hql', 'myproject.py']) {
      writeFileSync(join(testRoot, name), '', 'utf-8');
    }
    mkdirSync(join(testRoot, '4-logs'));

    const steps = discoverSteps(testRoot);

    expect(filenames(steps)).toEqual(['1-transfer_data.sh', '2-build_tables.hql', '3-pull_ingest.py']);
    expect(steps[0].filepath).toBe(join(testRoot, '1-transfer_data.sh'));
  });

  it('reports a missing directory', () => {
    expect(() => discoverSteps(join(testRoot, 'nope'))).toThrow(DirectoryNotFoundError);
  });

  it('reports a file given as the directory', () => {
    const file = join(testRoot, '1-a.sh');
    writeFileSync(file, '', 'utf-8');
    expect(() => discoverSteps(file)).toThrow(`Pipeline directory ${file} is not a directory`);
  });
});
