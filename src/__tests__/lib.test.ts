import path from 'path';
import * as treesift from '../lib';
import { verboseLog } from '../shared/verboseLog';
import { makeTempDir, removeTempDir, writeTree } from './helpers/tempTree';

describe('public entry point', () => {
  it('exposes the search, creation and I/O helpers', () => {
    expect(typeof treesift.walkDirectory).toBe('function');
    expect(typeof treesift.findFilesRecursive).toBe('function');
    expect(typeof treesift.ensureDirectories).toBe('function');
    expect(typeof treesift.modifyFile).toBe('function');
    expect(treesift.CreationState.PENDING).toBe('PENDING');
  });

  it('accepts compiled patterns as exclusion filters', () => {
    const root = makeTempDir();
    try {
      writeTree(root, { 'keep.txt': 'k', 'drop.log': 'd', logs: { 'inner.txt': 'i' } });

      const result = treesift.findFilesExcluding(root, treesift.compileExtensions(['log']), treesift.byName(['logs']));

      expect(Array.from(result)).toEqual([path.join(root, 'keep.txt')]);
    } finally {
      removeTempDir(root);
    }
  });
});

describe('verboseLog', () => {
  const original = process.env.TREESIFT_VERBOSE;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
    if (original === undefined) delete process.env.TREESIFT_VERBOSE;
    else process.env.TREESIFT_VERBOSE = original;
  });

  it('stays silent by default', () => {
    delete process.env.TREESIFT_VERBOSE;
    verboseLog('hidden');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('traces skipped directories when enabled', () => {
    process.env.TREESIFT_VERBOSE = 'true';

    Array.from(treesift.walkDirectory(path.join(makeTempDirPath(), 'missing')));

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0][0])).toContain('Skipping ');
  });
});

function makeTempDirPath(): string {
  const dir = makeTempDir();
  removeTempDir(dir);
  return dir;
}
