import { describe, it, expect } from 'vitest';
import { errorStatus } from './app';

describe('errorStatus', () => {
  it('should map upload errors to client statuses', () => {
    expect(errorStatus(new Error('Unsupported file type: .txt'))).toBe(400);
    expect(errorStatus(new Error('Invalid job id'))).toBe(400);
    expect(errorStatus(new Error('File too large'))).toBe(413);
  });

  it('should treat anything else as a server error', () => {
    expect(errorStatus(new Error('disk full'))).toBe(500);
  });
});
