import { describe, it, expect } from 'vitest';
import { formatBucketLabel, formatDuration, renderBar } from '../ProgressReporter.js';

describe('formatBucketLabel', () => {
  it('marks half-open and closed ranges', () => {
    expect(formatBucketLabel({ min: 0, max: 10, inclusiveMax: false, count: 3 })).toBe('0-10)');
    expect(formatBucketLabel({ min: 90, max: 100, inclusiveMax: true, count: 0 })).toBe('90-100]');
  });
});

describe('renderBar', () => {
  it('scales to the largest bucket', () => {
    expect(renderBar(5, 5)).toBe('█'.repeat(30));
    expect(renderBar(5, 10, 10)).toBe('█'.repeat(5));
  });

  it('draws at least one block for non-empty buckets', () => {
    expect(renderBar(1, 100)).toBe('█');
  });

  it('draws nothing for empty buckets', () => {
    expect(renderBar(0, 5)).toBe('');
    expect(renderBar(0, 0)).toBe('');
  });
});

describe('formatDuration', () => {
  it('formats minutes and seconds', () => {
    expect(formatDuration(0)).toBe('0:00');
    expect(formatDuration(65_000)).toBe('1:05');
    expect(formatDuration(59_500)).toBe('1:00');
  });

  it('adds hours when needed', () => {
    expect(formatDuration(3_723_000)).toBe('1:02:03');
  });
});
