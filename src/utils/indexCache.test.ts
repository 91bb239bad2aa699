import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createLibrary, removeLibrary } from '../test/fixtures';
import { createMemoryLog } from '../test/memoryLog';
import { loadIndex, saveIndex } from './indexCache';
import { scanLibrary } from './library';

describe('indexCache', () => {
  let root = '';
  let indexFile = '';

  beforeEach(() => {
    root = createLibrary({ 'Artist1/a.flac': 'aaaa', 'Artist2/b.m4a': 'bb' });
    indexFile = path.join(path.dirname(root), 'cache', 'music_index.json');
  });

  afterEach(() => {
    removeLibrary(root);
  });

  it('loads the tracks it saved', () => {
    const scan = scanLibrary(root, { log: createMemoryLog() });
    saveIndex(indexFile, scan, createMemoryLog());

    const loaded = loadIndex(indexFile, createMemoryLog());

    expect(loaded.root).toBe(scan.root);
    expect(loaded.tracks).toEqual(scan.tracks);
    expect([...loaded.index.keys()]).toEqual(['Artist1', 'Artist2']);
  });

  it('drops tracks that disappeared and refreshes sizes', () => {
    saveIndex(indexFile, scanLibrary(root, { log: createMemoryLog() }), createMemoryLog());
    fs.unlinkSync(path.join(root, 'Artist2', 'b.m4a'));
    fs.writeFileSync(path.join(root, 'Artist1', 'a.flac'), 'a'.repeat(10));
    const log = createMemoryLog();

    const loaded = loadIndex(indexFile, log);

    expect(loaded.tracks.map(track => [track.path, track.size])).toEqual([[path.join(root, 'Artist1', 'a.flac'), 10]]);
    expect(loaded.skipped.map(entry => entry.path)).toEqual([path.join(root, 'Artist2', 'b.m4a')]);
    expect(log.messages('warning')).toHaveLength(1);
  });

  it('ignores entries outside the indexed root', () => {
    fs.mkdirSync(path.dirname(indexFile), { recursive: true });
    fs.writeFileSync(indexFile, JSON.stringify({
      version: 1,
      root,
      createdAt: '2024-01-01T00:00:00.000Z',
      tracks: [{ path: '/elsewhere/x.flac', format: 'flac', size: 1, artist: 'X' }],
    }));

    const loaded = loadIndex(indexFile, createMemoryLog());

    expect(loaded.tracks).toEqual([]);
    expect(loaded.skipped).toEqual([{ path: '/elsewhere/x.flac', reason: 'invalid index entry' }]);
  });

  it('names artists again at the depth it is loaded with', () => {
    const nested = createLibrary({ 'Lossless/Artist/a.flac': 'a' });
    try {
      const nestedIndex = path.join(path.dirname(nested), 'index.json');
      saveIndex(nestedIndex, scanLibrary(nested, { log: createMemoryLog() }), createMemoryLog());

      expect(loadIndex(nestedIndex, createMemoryLog()).tracks.map(track => track.artist)).toEqual(['Lossless']);
      expect(loadIndex(nestedIndex, createMemoryLog(), 2).tracks.map(track => track.artist)).toEqual(['Artist']);
    } finally {
      removeLibrary(nested);
    }
  });

  it('rejects a file that is not an index', () => {
    fs.mkdirSync(path.dirname(indexFile), { recursive: true });
    fs.writeFileSync(indexFile, JSON.stringify({ version: 2, root, tracks: [] }));

    expect(() => loadIndex(indexFile, createMemoryLog())).toThrow(`Invalid index file: ${indexFile}`);
  });
});
