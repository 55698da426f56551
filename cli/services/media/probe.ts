import ffmpeg from 'fluent-ffmpeg';
import ffprobe from 'ffprobe-static';
import fs from 'fs-extra';
import sharp from 'sharp';
import { Dimensions } from './geometry-planner';

ffmpeg.setFfprobePath(process.env.FFPROBE_PATH || ffprobe.path);
if (process.env.FFMPEG_PATH) {
  ffmpeg.setFfmpegPath(process.env.FFMPEG_PATH);
}

export interface MediaInfo extends Dimensions {
  durationSeconds: number;
  videoCodec: string | null;
  audioCodec: string | null;
  hasAudio: boolean;
  sizeBytes: number;
}

export class ProbeError extends Error {
  readonly code = 'PROBE_FAILED';

  constructor(message: string, public readonly filePath: string) {
    super(message);
    this.name = 'ProbeError';
  }
}

/**
 * Read duration, frame size and codecs of a video file
 */
export function probeMedia(filePath: string): Promise<MediaInfo> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(filePath, (err, data) => {
      if (err) {
        const message = err instanceof Error ? err.message : String(err);
        return reject(new ProbeError(`Unable to probe ${filePath}: ${message}`, filePath));
      }

      const videoStream = data.streams.find((stream) => stream.codec_type === 'video');
      const audioStream = data.streams.find((stream) => stream.codec_type === 'audio');

      if (!videoStream || !videoStream.width || !videoStream.height) {
        return reject(new ProbeError(`Unable to read video dimensions of ${filePath}`, filePath));
      }

      const durationSec = data.format?.duration ? Number(data.format.duration) : Number(videoStream.duration || 0);

      resolve({
        width: videoStream.width,
        height: videoStream.height,
        durationSeconds: Number.isFinite(durationSec) ? durationSec : 0,
        videoCodec: videoStream.codec_name ?? null,
        audioCodec: audioStream?.codec_name ?? null,
        hasAudio: Boolean(audioStream),
        sizeBytes: data.format?.size ? Number(data.format.size) : 0,
      });
    });
  });
}

/**
 * Read the pixel size of an image file
 */
export async function probeImage(filePath: string): Promise<Dimensions & { sizeBytes: number }> {
  const [meta, stat] = await Promise.all([sharp(filePath).metadata(), fs.stat(filePath)]);
  if (!meta.width || !meta.height) {
    throw new ProbeError(`Unable to read image dimensions of ${filePath}`, filePath);
  }
  return { width: meta.width, height: meta.height, sizeBytes: stat.size };
}
