import { describe, expect, it } from 'vitest';
import { ConversionFailedError } from './errors';
import { estimateMp3Size, FfmpegTranscoder } from './transcoder';

describe('transcoder', () => {
  it('estimates constant bitrate output size', () => {
    expect(estimateMp3Size(60, 320)).toBe(2_400_000);
    expect(estimateMp3Size(1.5, 128)).toBe(24_000);
  });

  it('reports a missing ffmpeg binary as a failed conversion', async () => {
    const transcoder = new FfmpegTranscoder({ ffmpegPath: '/nonexistent/bin/ffmpeg' });

    await expect(transcoder.transcode('/nonexistent/in.flac', '/nonexistent/out.mp3'))
      .rejects.toBeInstanceOf(ConversionFailedError);
  });
});
