import { describe, it, expect } from 'vitest';
import { Duration } from './duration.js';

describe('Duration', () => {
  it('counts whole seconds across days', () => {
    const duration = Duration.fromSeconds(86405);
    expect(duration.days).toBe(1);
    expect(duration.seconds).toBe(5);
    expect(duration.totalSeconds()).toBe(86405);
  });

  it('is zero seconds when empty', () => {
    expect(Duration.fromMilliseconds(0).totalSeconds()).toBe(0);
  });

  it('drops the sub-second remainder', () => {
    expect(Duration.fromMilliseconds(1999).totalSeconds()).toBe(1);
  });

  it('normalises negative spans to negative days and positive seconds', () => {
    const duration = Duration.fromMilliseconds(-500);
    expect(duration.days).toBe(-1);
    expect(duration.seconds).toBe(86399);
    expect(duration.totalSeconds()).toBe(-1);
  });

  it('reports fractional hours', () => {
    expect(Duration.fromSeconds(5400).hours()).toBe(1.5);
    expect(Duration.ofDays(2).hours()).toBe(48);
  });

  it('measures and compares spans', () => {
    const start = new Date('2026-10-19T10:00:00Z');
    const end = new Date('2026-10-19T12:30:00Z');
    const span = Duration.between(start, end);
    expect(span.totalSeconds()).toBe(9000);
    expect(span.dividedBy(2).totalSeconds()).toBe(4500);
    expect(span.isLongerThan(Duration.ofHours(2))).toBe(true);
    expect(span.compareTo(Duration.ofHours(3))).toBeLessThan(0);
    expect(Duration.ofHours(1).before(end).toISOString()).toBe('2026-10-19T11:30:00.000Z');
  });
});
