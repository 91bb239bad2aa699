import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { Transcoder } from '../utils/transcoder';

/**
 * Creates a temporary library from relative paths to file contents.
 */
export function createLibrary(files: Record<string, string>, name = 'library'): string {
  const base = fs.mkdtempSync(path.join(os.tmpdir(), 'lossless-to-mp3-'));
  const root = path.join(base, name);
  fs.mkdirSync(root, { recursive: true });
  for (const [relativePath, contents] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, contents);
  }
  return root;
}

export function removeLibrary(root: string): void {
  fs.rmSync(path.dirname(root), { recursive: true, force: true });
}

/**
 * Relative path and contents of every file below `root`, sorted by path.
 */
export function snapshotTree(root: string): [string, string][] {
  const files: [string, string][] = [];
  const walk = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(fullPath);
      } else {
        files.push([path.relative(root, fullPath), fs.readFileSync(fullPath, 'utf8')]);
      }
    }
  };
  walk(root);
  return files.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}

/**
 * Stands in for ffmpeg: writes a fixed number of bytes per source, and fails
 * for sources whose name is listed in `failFor`.
 */
export class FakeTranscoder implements Transcoder {
  readonly transcoded: [string, string][] = [];
  readonly probed: string[] = [];

  constructor(
    private readonly outputBytes = 10,
    private readonly failFor: string[] = [],
    private readonly estimate: number | undefined = 4
  ) {}

  async transcode(source: string, destination: string): Promise<void> {
    this.transcoded.push([source, destination]);
    if (this.failFor.includes(path.basename(source))) {
      fs.writeFileSync(destination, 'partial');
      throw new Error('ffmpeg exited with code 1');
    }
    fs.writeFileSync(destination, 'x'.repeat(this.outputBytes));
  }

  async estimateOutputSize(source: string): Promise<number | undefined> {
    this.probed.push(source);
    return this.estimate;
  }
}
