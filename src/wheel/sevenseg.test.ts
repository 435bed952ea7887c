import { describe, it, expect } from 'vitest';
import { glyphMetrics, digitSegments, textSegments } from './sevenseg';

describe('Seven-segment glyphs', () => {
  const metrics = glyphMetrics(10);

  it('derives glyph metrics from the height', () => {
    expect(metrics.width).toBe(6);
    expect(metrics.stroke).toBeCloseTo(1.8);
    expect(metrics.advance).toBe(8);
  });

  it('lights the right number of segments per digit', () => {
    const counts = [...'0123456789'].map((d) => digitSegments(d, metrics).length);
    expect(counts).toEqual([6, 2, 5, 5, 4, 5, 6, 3, 7, 6]);
  });

  it('draws nothing for characters that are not digits', () => {
    expect(digitSegments('-', metrics)).toEqual([]);
  });

  it('places the segments of a one', () => {
    const [b, c] = digitSegments('1', metrics);
    expect(b.u).toBeCloseTo(2.1);
    expect(b.v).toBe(2.5);
    expect(c.v).toBe(-2.5);
    expect(b.width).toBeCloseTo(1.8);
    expect(b.height).toBeCloseTo(4.1);
  });

  it('centres multi-digit text', () => {
    // "11": total width 2 * 8 - 2 = 14, glyph centres at -4 and +4
    const rects = textSegments('11', metrics);
    expect(rects).toHaveLength(4);
    expect(rects[0].u).toBeCloseTo(-4 + 2.1);
    expect(rects[2].u).toBeCloseTo(4 + 2.1);
  });
});
