/** Axis-aligned rectangle in glyph coordinates: centre (u, v), size width x height. */
export interface SegmentRect {
  u: number;
  v: number;
  width: number;
  height: number;
}

type Segment = 'a' | 'b' | 'c' | 'd' | 'e' | 'f' | 'g';

//  aaa
// f   b
//  ggg
// e   c
//  ddd
const DIGIT_SEGMENTS: Record<string, readonly Segment[]> = {
  '0': ['a', 'b', 'c', 'd', 'e', 'f'],
  '1': ['b', 'c'],
  '2': ['a', 'b', 'g', 'e', 'd'],
  '3': ['a', 'b', 'g', 'c', 'd'],
  '4': ['f', 'g', 'b', 'c'],
  '5': ['a', 'f', 'g', 'c', 'd'],
  '6': ['a', 'f', 'g', 'e', 'c', 'd'],
  '7': ['a', 'b', 'c'],
  '8': ['a', 'b', 'c', 'd', 'e', 'f', 'g'],
  '9': ['a', 'b', 'c', 'd', 'f', 'g'],
};

export interface GlyphMetrics {
  height: number;
  width: number;
  stroke: number;
  advance: number;
}

export function glyphMetrics(height: number): GlyphMetrics {
  const width = 0.6 * height;
  return {
    height,
    width,
    stroke: 0.18 * height,
    advance: width + 0.2 * height,
  };
}

/** Segment rectangles of one digit centred on the origin. Unknown characters draw nothing. */
export function digitSegments(ch: string, metrics: GlyphMetrics): SegmentRect[] {
  const { width: w, height: h, stroke: sw } = metrics;
  const horizontal = (v: number): SegmentRect => ({ u: 0, v, width: w, height: sw });
  const vertical = (u: number, v: number): SegmentRect => ({
    u,
    v,
    width: sw,
    height: h / 2 - sw / 2,
  });

  const left = -w / 2 + sw / 2;
  const right = w / 2 - sw / 2;

  return (DIGIT_SEGMENTS[ch] ?? []).map((segment) => {
    switch (segment) {
      case 'a':
        return horizontal(h / 2 - sw / 2);
      case 'g':
        return horizontal(0);
      case 'd':
        return horizontal(-h / 2 + sw / 2);
      case 'b':
        return vertical(right, h / 4);
      case 'c':
        return vertical(right, -h / 4);
      case 'e':
        return vertical(left, -h / 4);
      case 'f':
        return vertical(left, h / 4);
    }
  });
}

/** Segment rectangles of a whole line of digits, centred on the origin along u. */
export function textSegments(text: string, metrics: GlyphMetrics): SegmentRect[] {
  const chars = [...text];
  const totalWidth = chars.length * metrics.advance - 0.2 * metrics.height;

  return chars.flatMap((ch, index) => {
    const offset = -totalWidth / 2 + index * metrics.advance + metrics.width / 2;
    return digitSegments(ch, metrics).map((rect) => ({ ...rect, u: rect.u + offset }));
  });
}
