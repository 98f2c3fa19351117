import * as path from 'path';
import * as fsExtra from 'fs-extra';
import {
  DestinationPlacer,
  PLACEMENT_STRATEGIES,
  anchorReconstruct,
  directRemap,
} from '../services/restore/DestinationPlacer';
import { DestinationIndex } from '../services/restore/DestinationIndex';
import { loadExcludeMatcher } from '../utils/ignore';
import { isWithin } from '../utils/paths';
import { makeTempDir, recordingLogger, writeFiles } from './fixtures';

describe('DestinationPlacer', () => {
  let tmp: string;
  let sourceRoot: string;
  let destinationRoot: string;

  beforeEach(async () => {
    tmp = await makeTempDir();
    sourceRoot = path.join(tmp, 'proj');
    destinationRoot = path.join(tmp, 'proj2');
    await fsExtra.ensureDir(destinationRoot);
  });

  afterEach(async () => {
    await fsExtra.remove(tmp);
  });

  const placer = (overrides: Partial<ConstructorParameters<typeof DestinationPlacer>[0]> = {}) =>
    new DestinationPlacer({ sourceRoot, destinationRoot, logger: recordingLogger(), ...overrides });

  it('evaluates tiers in a fixed order', () => {
    expect(PLACEMENT_STRATEGIES.map(s => s.tier)).toEqual(['direct', 'suffix', 'anchor', 'flat']);
  });

  describe('direct remap', () => {
    it('mirrors the position under the source root', async () => {
      const result = await placer().chooseDest(path.join(sourceRoot, 'src', 'a.py'));
      expect(result).toEqual({ path: path.join(destinationRoot, 'src', 'a.py'), tier: 'direct' });
    });

    it('ignores namesakes elsewhere in the destination', async () => {
      await writeFiles(destinationRoot, { 'moved/deeper/a.py': 'x' });
      const result = await placer().chooseDest(path.join(sourceRoot, 'src', 'a.py'));
      expect(result.path).toBe(path.join(destinationRoot, 'src', 'a.py'));
    });

    it('indexes the destination on the first placement even when no lookup is needed', async () => {
      await writeFiles(destinationRoot, { 'moved/deeper/a.py': 'x' });
      const p = placer();
      expect(p.index.isBuilt).toBe(false);

      await p.chooseDest(path.join(sourceRoot, 'src', 'a.py'));
      expect(p.index.isBuilt).toBe(true);

      await writeFiles(destinationRoot, { 'src/later.py': 'written after' });
      const result = await p.chooseDest('/elsewhere/later.py');
      expect(result).toEqual({ path: path.join(destinationRoot, 'later.py'), tier: 'flat' });
    });

    it('returns null for paths outside the source root', () => {
      const index = new DestinationIndex(destinationRoot);
      const context = { sourceRoot, sourceRootName: 'proj', destinationRoot, minSuffixMatch: 1, index };
      expect(directRemap('/elsewhere/proj/a.py', context)).toBeNull();
    });
  });

  describe('suffix match', () => {
    it('finds a file that moved inside a reorganized tree', async () => {
      await writeFiles(destinationRoot, { 'core/utils/util.py': 'current' });
      const result = await placer().chooseDest('/old-machine/proj/lib/util.py');
      expect(result).toEqual({ path: path.join(destinationRoot, 'core', 'utils', 'util.py'), tier: 'suffix' });
    });

    it('prefers the candidate with the deeper matching directory suffix', async () => {
      await writeFiles(destinationRoot, {
        'b/util.py': '1',
        'a/lib/util.py': '2',
      });
      const result = await placer().chooseDest('/elsewhere/x/lib/util.py');
      expect(result.path).toBe(path.join(destinationRoot, 'a', 'lib', 'util.py'));
    });

    it('prefers the shallower candidate when suffix depth ties', async () => {
      await writeFiles(destinationRoot, {
        'deep/nested/util.py': '1',
        'top/util.py': '2',
      });
      const result = await placer().chooseDest('/elsewhere/q/util.py');
      expect(result.path).toBe(path.join(destinationRoot, 'top', 'util.py'));
    });

    it('takes the first path in sorted order on a full tie', async () => {
      await writeFiles(destinationRoot, {
        'b/util.py': '1',
        'a/util.py': '2',
      });
      const result = await placer().chooseDest('/elsewhere/q/util.py');
      expect(result.path).toBe(path.join(destinationRoot, 'a', 'util.py'));
    });

    it('accepts a filename-only match by default', async () => {
      await writeFiles(destinationRoot, { 'other/util.py': 'x' });
      const result = await placer().chooseDest('/elsewhere/proj/lib/util.py');
      expect(result).toEqual({ path: path.join(destinationRoot, 'other', 'util.py'), tier: 'suffix' });
    });

    it('falls through when minSuffixMatch demands directory agreement', async () => {
      await writeFiles(destinationRoot, { 'other/util.py': 'x' });
      const result = await placer({ minSuffixMatch: 2 }).chooseDest('/elsewhere/proj/lib/util.py');
      expect(result).toEqual({ path: path.join(destinationRoot, 'lib', 'util.py'), tier: 'anchor' });
    });

    it('skips excluded destination paths', async () => {
      await writeFiles(destinationRoot, {
        'node_modules/pkg/util.py': 'vendored',
        'lib/util.py': 'ours',
      });
      const isExcluded = loadExcludeMatcher(['node_modules']);
      const result = await placer({ isExcluded }).chooseDest('/elsewhere/pkg/util.py');
      expect(result.path).toBe(path.join(destinationRoot, 'lib', 'util.py'));
    });
  });

  describe('anchor reconstruction', () => {
    it('re-roots everything after the source folder name', async () => {
      const result = await placer().chooseDest('/mnt/backup/proj/src/new.py');
      expect(result).toEqual({ path: path.join(destinationRoot, 'src', 'new.py'), tier: 'anchor' });
    });

    it('uses the first occurrence of the anchor', () => {
      const index = new DestinationIndex(destinationRoot);
      const context = { sourceRoot, sourceRootName: 'proj', destinationRoot, minSuffixMatch: 1, index };
      expect(anchorReconstruct('/a/proj/b/proj/c.py', context)).toBe(path.join(destinationRoot, 'b', 'proj', 'c.py'));
    });

    it('falls back to the filename when the anchor is the last segment', async () => {
      const result = await placer().chooseDest('/mnt/backup/proj');
      expect(result).toEqual({ path: path.join(destinationRoot, 'proj'), tier: 'anchor' });
    });
  });

  describe('flat fallback', () => {
    it('drops all directory structure', async () => {
      const result = await placer().chooseDest('/somewhere/else/readme.md');
      expect(result).toEqual({ path: path.join(destinationRoot, 'readme.md'), tier: 'flat' });
    });
  });

  it('always returns a path inside the destination root', async () => {
    await writeFiles(destinationRoot, { 'x/shared.txt': '1' });
    const p = placer();
    const inputs = [
      path.join(sourceRoot, 'a', 'b.txt'),
      '/elsewhere/shared.txt',
      '/elsewhere/proj/deep/c.txt',
      '/nowhere/d.txt',
      '/',
    ];
    for (const input of inputs) {
      const result = await p.chooseDest(input);
      expect(isWithin(result.path, destinationRoot)).toBe(true);
    }
  });

  describe('index staleness', () => {
    it('does not see files written after the index was built by default', async () => {
      await writeFiles(destinationRoot, { 'seed/util.py': 'x' });
      const p = placer();
      await p.chooseDest('/elsewhere/util.py');
      expect(p.index.isBuilt).toBe(true);

      const written = path.join(destinationRoot, 'fresh', 'z.py');
      await writeFiles(destinationRoot, { 'fresh/z.py': 'new' });
      p.noteWritten(written);

      const result = await p.chooseDest('/elsewhere/fresh/z.py');
      expect(result).toEqual({ path: path.join(destinationRoot, 'z.py'), tier: 'flat' });
    });

    it('sees written files when refreshIndex is enabled', async () => {
      await writeFiles(destinationRoot, { 'seed/util.py': 'x' });
      const p = placer({ refreshIndex: true });
      await p.chooseDest('/elsewhere/util.py');

      const written = path.join(destinationRoot, 'fresh', 'z.py');
      await writeFiles(destinationRoot, { 'fresh/z.py': 'new' });
      p.noteWritten(written);

      const result = await p.chooseDest('/elsewhere/fresh/z.py');
      expect(result).toEqual({ path: written, tier: 'suffix' });
    });
  });

  describe('DestinationIndex', () => {
    it('stops at maxFiles and warns once', async () => {
      await writeFiles(destinationRoot, { 'a.txt': '1', 'b.txt': '2', 'c.txt': '3' });
      const logger = recordingLogger();
      const index = new DestinationIndex(destinationRoot, { maxFiles: 2, logger });
      await index.candidates('a.txt');
      expect(index.size).toBe(2);
      expect(index.isTruncated).toBe(true);
      expect(logger.warnings).toEqual([
        `destination index stopped at 2 files under ${destinationRoot}; raise --max-index-files to index more`,
      ]);
    });

    it('indexes dot-files and groups paths by base name', async () => {
      await writeFiles(destinationRoot, { '.env': 'A=1', 'x/.env': 'A=2', 'y/z.txt': '' });
      const index = new DestinationIndex(destinationRoot);
      expect(await index.candidates('.env')).toEqual([
        path.join(destinationRoot, '.env'),
        path.join(destinationRoot, 'x', '.env'),
      ]);
      expect(index.size).toBe(3);
      expect(index.isTruncated).toBe(false);
    });
  });
});
