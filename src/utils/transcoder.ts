import ffmpeg from 'fluent-ffmpeg';
import { ConversionFailedError } from './errors';

export const DEFAULT_BITRATE = 320;

export interface Transcoder {
  /** Resolves once `destination` is written; rejects with ConversionFailedError. */
  transcode(source: string, destination: string): Promise<void>;
  /** Expected MP3 size in bytes, or undefined when the duration is unknown. */
  estimateOutputSize(source: string): Promise<number | undefined>;
}

export interface FfmpegTranscoderOptions {
  /** Audio bitrate in kbps. */
  bitrate?: number;
  ffmpegPath?: string;
  ffprobePath?: string;
}

/**
 * Expected size of a constant bitrate stream: kbps * 1000 / 8 bytes per second.
 */
export function estimateMp3Size(durationSeconds: number, bitrate: number): number {
  return Math.round(durationSeconds * bitrate * 1000 / 8);
}

/**
 * Transcodes to MP3 with the ffmpeg binary, through fluent-ffmpeg.
 */
export class FfmpegTranscoder implements Transcoder {
  private readonly bitrate: number;

  constructor(private readonly options: FfmpegTranscoderOptions = {}) {
    this.bitrate = options.bitrate ?? DEFAULT_BITRATE;
  }

  private command(source: string): ffmpeg.FfmpegCommand {
    const command = ffmpeg(source);
    if (this.options.ffmpegPath) command.setFfmpegPath(this.options.ffmpegPath);
    if (this.options.ffprobePath) command.setFfprobePath(this.options.ffprobePath);
    return command;
  }

  transcode(source: string, destination: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.command(source)
        .audioCodec('libmp3lame')
        .audioBitrate(this.bitrate)
        .format('mp3')
        .on('error', (error: Error) => {
          reject(new ConversionFailedError(source, error));
        })
        .on('end', () => {
          resolve();
        })
        .save(destination);
    });
  }

  estimateOutputSize(source: string): Promise<number | undefined> {
    return new Promise((resolve, reject) => {
      this.command(source).ffprobe((error: unknown, metadata: ffmpeg.FfprobeData) => {
        if (error) {
          reject(error instanceof Error ? error : new Error(`ffprobe failed for ${source}`));
          return;
        }
        const duration = metadata.format.duration;
        resolve(duration === undefined ? undefined : estimateMp3Size(duration, this.bitrate));
      });
    });
  }
}
