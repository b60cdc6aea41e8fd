import fs from 'fs';
import path from 'path';
import { TraversalError } from '../errors';
import { byName, byWildcard } from '../shared/filters';
import { compileWildcard } from '../shared/pathMatcher';
import { listChildren, walkDirectory } from '../shared/walkDirectory';
import { FileNode, WalkOptions } from '../types';
import { listAllFiles, makeTempDir, removeTempDir, writeTree } from './helpers/tempTree';

describe('walkDirectory', () => {
  let root: string;

  const walkPaths = (options: WalkOptions = {}, from = root) =>
    Array.from(walkDirectory(from, options), (node: FileNode) => path.relative(root, node.absolutePath)).sort();

  beforeAll(() => {
    root = makeTempDir();
    writeTree(root, {
      'a.txt': 'a',
      'b.log': 'b',
      sub: {
        'c.txt': 'c',
        deep: { 'd.txt': 'd' },
      },
      '.hidden': { 'e.txt': 'e' },
      node_modules: { 'f.txt': 'f' },
      empty: {},
    });
  });

  afterAll(() => {
    removeTempDir(root);
  });

  it('yields only direct file children when not recursive', () => {
    expect(walkPaths({ recursive: false })).toEqual(['a.txt', 'b.log']);
  });

  it('finds the same files as an exhaustive enumeration when recursive', () => {
    const walked = Array.from(walkDirectory(root), node => node.absolutePath).sort();

    expect(walked).toEqual(listAllFiles(root).sort());
    expect(walked).toHaveLength(6);
  });

  it('yields directories before their descendants', () => {
    const order = Array.from(walkDirectory(root, { includeDirectories: true }), node =>
      path.relative(root, node.absolutePath));

    expect(order.indexOf('sub')).toBeLessThan(order.indexOf(path.join('sub', 'c.txt')));
    expect(order.indexOf(path.join('sub', 'deep'))).toBeLessThan(order.indexOf(path.join('sub', 'deep', 'd.txt')));
    expect(order).toContain('empty');
  });

  it('reports node attributes', () => {
    const nodes = Array.from(walkDirectory(root, { recursive: false, includeDirectories: true }));
    const sub = nodes.find(node => node.name === 'sub');

    expect(sub).toEqual({ name: 'sub', absolutePath: path.join(root, 'sub'), isDirectory: true });
  });

  it('gates files with a compiled pattern without pruning directories', () => {
    expect(walkPaths({ matcher: compileWildcard('d.txt') })).toEqual([path.join('sub', 'deep', 'd.txt')]);
  });

  it('accepts a predicate as matcher', () => {
    expect(walkPaths({ matcher: node => node.name.startsWith('c') })).toEqual([path.join('sub', 'c.txt')]);
  });

  it('yields directories without testing them unless matchDirectories is set', () => {
    const options: WalkOptions = { includeDirectories: true, matcher: compileWildcard('s*') };

    expect(walkPaths(options)).toEqual(['.hidden', 'empty', 'node_modules', 'sub', path.join('sub', 'deep')]);
    expect(walkPaths({ ...options, matchDirectories: true })).toEqual(['sub']);
  });

  it('prunes entries matched by an exclusion filter', () => {
    expect(walkPaths({ excludeFilters: [byName(['sub', '.hidden', 'node_modules'])] })).toEqual(['a.txt', 'b.log']);
  });

  it('gives exclusion priority over inclusion', () => {
    const result = walkPaths({ recursive: false, matcher: compileWildcard('*.txt'), excludeFilters: [byName(['a.txt'])] });

    expect(result).toEqual([]);
  });

  it('applies exclusion filters independently of order and repetition', () => {
    const f1 = byName(['sub']);
    const f2 = byWildcard('*.log');

    const forward = walkPaths({ excludeFilters: [f1, f2] });

    expect(walkPaths({ excludeFilters: [f2, f1] })).toEqual(forward);
    expect(walkPaths({ excludeFilters: [f1, f2, f1] })).toEqual(forward);
    expect(forward).toEqual([path.join('.hidden', 'e.txt'), 'a.txt', path.join('node_modules', 'f.txt')]);
  });

  it('prunes named and hidden directories', () => {
    expect(walkPaths({ excludeDirs: ['node_modules'], excludeHiddenDirs: true })).toEqual([
      'a.txt', 'b.log', path.join('sub', 'c.txt'), path.join('sub', 'deep', 'd.txt'),
    ]);
  });

  it('stops listing below maxDepth', () => {
    expect(walkPaths({ maxDepth: 0 })).toEqual(['a.txt', 'b.log']);
    expect(walkPaths({ maxDepth: 1, excludeDirs: ['node_modules', '.hidden'] })).toEqual([
      'a.txt', 'b.log', path.join('sub', 'c.txt'),
    ]);
  });

  it('returns nothing for a missing root or a file root', () => {
    expect(Array.from(walkDirectory(path.join(root, 'missing')))).toEqual([]);
    expect(Array.from(walkDirectory(path.join(root, 'a.txt')))).toEqual([]);
    expect(Array.from(walkDirectory(path.join(root, 'empty')))).toEqual([]);
  });

  it('throws TraversalError in strict mode', () => {
    const missing = path.join(root, 'missing');

    expect(() => Array.from(walkDirectory(missing, { strict: true }))).toThrow(TraversalError);
    try {
      Array.from(walkDirectory(path.join(root, 'a.txt'), { strict: true }));
      throw new Error('expected a TraversalError');
    } catch (error) {
      expect(error).toBeInstanceOf(TraversalError);
      if (error instanceof TraversalError) expect(error.status).toBe('not-a-directory');
    }
  });

  it('does not treat an empty directory as an error in strict mode', () => {
    expect(Array.from(walkDirectory(path.join(root, 'empty'), { strict: true }))).toEqual([]);
  });

  it('is lazy', () => {
    const iterator = walkDirectory(root, { recursive: false });
    const first = iterator.next();

    expect(first.done).toBe(false);
    iterator.return();
  });
});

describe('walkDirectory with a subdirectory that disappears mid-walk', () => {
  const siblings = ['a', 'b', 'c'];
  let root: string;
  let removed: string | undefined;

  beforeEach(() => {
    root = makeTempDir();
    removed = undefined;
    writeTree(root, {
      a: { 'f.txt': 'a' },
      b: { 'f.txt': 'b' },
      c: { 'f.txt': 'c' },
    });
  });

  afterEach(() => {
    removeTempDir(root);
  });

  // The first node yielded is a top-level directory whose children are not
  // listed yet; one of its siblings is removed before the walk reaches it.
  function walkRemovingSibling(options: WalkOptions): string[] {
    const seen: string[] = [];
    for (const node of walkDirectory(root, { ...options, includeDirectories: true })) {
      seen.push(path.relative(root, node.absolutePath));
      if (removed === undefined) {
        removed = siblings.find(name => name !== node.name);
        if (removed !== undefined) fs.rmSync(path.join(root, removed), { recursive: true });
      }
    }
    return seen.sort();
  }

  it('skips only the directory that can no longer be listed', () => {
    const seen = walkRemovingSibling({});

    expect(removed).toBeDefined();
    expect(seen).toEqual([
      ...siblings,
      ...siblings.filter(name => name !== removed).map(name => path.join(name, 'f.txt')),
    ].sort());
  });

  it('raises TraversalError for that directory in strict mode', () => {
    try {
      walkRemovingSibling({ strict: true });
      throw new Error('expected a TraversalError');
    } catch (error) {
      expect(error).toBeInstanceOf(TraversalError);
      if (error instanceof TraversalError && removed !== undefined) {
        expect(error.status).toBe('not-found');
        expect(error.directory).toBe(path.join(root, removed));
      }
    }
  });
});

describe('listChildren', () => {
  let root: string;

  beforeAll(() => {
    root = makeTempDir();
    writeTree(root, { empty: {}, 'file.txt': 'x' });
  });

  afterAll(() => {
    removeTempDir(root);
  });

  it('classifies listings', () => {
    expect(listChildren(path.join(root, 'empty'))).toEqual({ status: 'empty' });
    expect(listChildren(path.join(root, 'nope')).status).toBe('not-found');
    expect(listChildren(path.join(root, 'file.txt')).status).toBe('not-a-directory');

    const listing = listChildren(root);
    expect(listing.status).toBe('ok');
    if (listing.status === 'ok') {
      expect(listing.entries.map(entry => entry.name).sort()).toEqual(['empty', 'file.txt']);
    }
  });
});
