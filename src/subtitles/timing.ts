const SRT_TIMESTAMP_PATTERN = /^(\d+):(\d{2}):(\d{2})[,.](\d{1,3})$/;

/**
 * Converts SRT timestamp format (HH:MM:SS,mmm) to milliseconds
 * @param timestamp - Timestamp in format "HH:MM:SS,mmm" or "HH:MM:SS.mmm"
 * @returns Time in whole milliseconds
 */
export function timestampToMillis(timestamp: string): number {
  const match = SRT_TIMESTAMP_PATTERN.exec(timestamp.trim());

  if (!match) {
    throw new Error(`Invalid SRT timestamp format: ${timestamp}`);
  }

  const hours = parseInt(match[1] ?? '0', 10);
  const minutes = parseInt(match[2] ?? '0', 10);
  const seconds = parseInt(match[3] ?? '0', 10);
  // "1,5" means 500ms, not 5ms
  const milliseconds = parseInt((match[4] ?? '0').padEnd(3, '0'), 10);

  return ((hours * 60 + minutes) * 60 + seconds) * 1000 + milliseconds;
}

/**
 * Converts milliseconds to SRT timestamp format (HH:MM:SS,mmm)
 * Fractional milliseconds are truncated.
 */
export function millisToTimestamp(millis: number): string {
  const total = Math.max(0, Math.floor(millis));
  const hours = Math.floor(total / 3600000);
  const minutes = Math.floor((total % 3600000) / 60000);
  const secs = Math.floor((total % 60000) / 1000);
  const ms = total % 1000;

  return (
    `${hours.toString().padStart(2, '0')}:` +
    `${minutes.toString().padStart(2, '0')}:` +
    `${secs.toString().padStart(2, '0')},` +
    `${ms.toString().padStart(3, '0')}`
  );
}

/**
 * Converts milliseconds to the ASS timestamp form (H:MM:SS.cc)
 * Centiseconds are floored, never rounded.
 */
export function millisToPresentationTimestamp(millis: number): string {
  const total = Math.max(0, Math.floor(millis));
  const hours = Math.floor(total / 3600000);
  const minutes = Math.floor((total % 3600000) / 60000);
  const secs = Math.floor((total % 60000) / 1000);
  const centiseconds = Math.floor((total % 1000) / 10);

  return (
    `${hours}:` +
    `${minutes.toString().padStart(2, '0')}:` +
    `${secs.toString().padStart(2, '0')}.` +
    `${centiseconds.toString().padStart(2, '0')}`
  );
}

/**
 * Reinterprets an SRT timestamp as an ASS timestamp
 * @example timestampToPresentationTimestamp('00:01:02,345') // '0:01:02.34'
 */
export function timestampToPresentationTimestamp(timestamp: string): string {
  return millisToPresentationTimestamp(timestampToMillis(timestamp));
}
