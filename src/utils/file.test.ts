import * as fs from 'fs';
import * as path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { createLibrary, removeLibrary } from '../test/fixtures';
import { createMemoryLog } from '../test/memoryLog';
import { compareStrings, isInsideDirectory, moveFile, traverseDirectory } from './file';

describe('file', () => {
  let root = '';

  afterEach(() => {
    if (root) removeLibrary(root);
    root = '';
  });

  it('compares by code unit, not locale', () => {
    expect(['b', 'a', 'B', 'Á'].sort(compareStrings)).toEqual(['B', 'a', 'b', 'Á']);
  });

  it('tells whether a path lies inside a directory', () => {
    expect(isInsideDirectory('/music', '/music/Artist/a.flac')).toBe(true);
    expect(isInsideDirectory('/music', '/music')).toBe(true);
    expect(isInsideDirectory('/music', '/musical/a.flac')).toBe(false);
    expect(isInsideDirectory('/music', '/other/a.flac')).toBe(false);
  });

  it('moves a file into a directory that does not exist yet', () => {
    root = createLibrary({ 'Artist/a.flac': 'audio' });
    const destination = path.join(root, 'FLAC_CONVERTED', 'Artist', 'a.flac');

    moveFile(path.join(root, 'Artist', 'a.flac'), destination);

    expect(fs.readFileSync(destination, 'utf8')).toBe('audio');
    expect(fs.existsSync(path.join(root, 'Artist', 'a.flac'))).toBe(false);
  });

  it('visits files in name order and skips excluded directories', () => {
    root = createLibrary({
      'b/2.flac': '',
      'a/1.flac': '',
      'a/0.txt': '',
      'skip/3.flac': '',
    });
    const visited: string[] = [];

    traverseDirectory(root, filePath => visited.push(path.relative(root, filePath)), {
      log: createMemoryLog(),
      filter: name => name.endsWith('.flac'),
      excludeDirs: [path.join(root, 'skip')],
    });

    expect(visited).toEqual([path.join('a', '1.flac'), path.join('b', '2.flac')]);
  });
});
