import { CaptionEntry } from './types';

export const DEFAULT_FPS = 60;

export interface OverlapRepairResult {
  entries: CaptionEntry[];
  /** Number of entries whose end time was pulled back */
  adjusted: number;
}

/**
 * Pulls each caption's end time back so it finishes one frame before the next caption starts.
 *
 * Only the immediate neighbour is checked, in a single forward pass. A run of three or more
 * colliding captions may still overlap afterwards; the next entry is never moved.
 *
 * @param entries - Captions in stream order
 * @param fps - Frame rate used to derive the minimum gap (1000 / fps ms)
 */
export function repairOverlapsWithReport(
  entries: readonly CaptionEntry[],
  fps: number = DEFAULT_FPS
): OverlapRepairResult {
  if (!Number.isFinite(fps) || fps <= 0) {
    throw new RangeError(`fps must be a positive number, got ${fps}`);
  }

  const frameDurationMs = 1000 / fps;
  let adjusted = 0;

  const repaired = entries.map((entry, i) => {
    const next = entries[i + 1];
    if (next && entry.endMs >= next.startMs) {
      adjusted++;
      return { ...entry, endMs: Math.floor(next.startMs - frameDurationMs) };
    }
    return { ...entry };
  });

  return { entries: repaired, adjusted };
}

/**
 * Returns a copy of the captions with overlapping end times repaired
 */
export function repairOverlaps(entries: readonly CaptionEntry[], fps: number = DEFAULT_FPS): CaptionEntry[] {
  return repairOverlapsWithReport(entries, fps).entries;
}
