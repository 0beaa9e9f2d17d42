// video_duration.ts - Clip length from container metadata

import { parseFile } from 'music-metadata';
import { errorMessage } from './types.ts';

export type DurationProbe = (filePath: string) => Promise<number>;

/**
 * Whole seconds, rounded up. Returns 0 when the container carries no
 * readable duration.
 */
export const probeVideoDurationSeconds: DurationProbe = async (filePath) => {
  try {
    const metadata = await parseFile(filePath, { duration: true });
    const seconds = metadata.format.duration;
    if (seconds === undefined || !Number.isFinite(seconds) || seconds < 0) {
      console.warn('[UsageLog] No duration in video metadata:', filePath);
      return 0;
    }
    return Math.ceil(seconds);
  } catch (err) {
    console.error('[UsageLog] Video duration lookup failed:', { filePath, error: errorMessage(err) });
    return 0;
  }
};
