import { describe, it, expect } from 'vitest';
import {
  makeWheelMesh,
  plateSides,
  faceIndex,
  faceAngle,
  engravingDepth,
  DEFAULT_WHEEL_OPTIONS,
} from './modeler';
import { ValidationError } from './errors';
import type { SerializedMesh } from '../types';

function zRange(mesh: SerializedMesh): [number, number] {
  let min = Infinity;
  let max = -Infinity;
  for (let i = 2; i < mesh.vertices.length; i += 3) {
    min = Math.min(min, mesh.vertices[i]);
    max = Math.max(max, mesh.vertices[i]);
  }
  return [min, max];
}

function maxRadius(mesh: SerializedMesh): number {
  let max = 0;
  for (let i = 0; i < mesh.vertices.length; i += 3) {
    max = Math.max(max, Math.hypot(mesh.vertices[i], mesh.vertices[i + 1]));
  }
  return max;
}

describe('Wheel layout', () => {
  it('uses one plate face per distance', () => {
    expect(plateSides(3)).toBe(3);
    expect(plateSides(8)).toBe(8);
  });

  it('puts a pair of distances on opposite faces of a square', () => {
    expect(plateSides(2)).toBe(4);
    expect(faceIndex(0, 2, 4)).toBe(0);
    expect(faceIndex(1, 2, 4)).toBe(2);
  });

  it('runs faces clockwise from the first one', () => {
    expect(faceAngle(0, 4)).toBeCloseTo(-Math.PI / 4);
    expect(faceAngle(1, 4)).toBeCloseTo((-3 * Math.PI) / 4);
  });

  it('keeps engravings from meeting in the middle', () => {
    expect(engravingDepth(DEFAULT_WHEEL_OPTIONS)).toBe(0.5);
    expect(engravingDepth({ ...DEFAULT_WHEEL_OPTIONS, thickness: 0.8 })).toBeCloseTo(0.35);
  });
});

describe('makeWheelMesh', () => {
  it('builds the expected features for three distances', () => {
    const mesh = makeWheelMesh([3, 5, 7]);

    // plate 8 + prongs 6 * 8 + thumb well 96 * 3 + labels (5 + 5 + 3 segments) * 12 * 2
    expect(mesh.indices.length / 3).toBe(656);
  });

  it('builds the expected features for two distances', () => {
    const mesh = makeWheelMesh([10, 20]);

    // plate 12 + prongs 4 * 8 + thumb well 288 + labels "10" and "20" (8 + 11 segments) * 24
    expect(mesh.indices.length / 3).toBe(788);
  });

  it('honours the segment count of round features', () => {
    const mesh = makeWheelMesh([10, 20], { segments: 8 });
    expect(mesh.indices.length / 3).toBe(12 + 32 + 24 + 456);
  });

  it('stays within the plate thickness', () => {
    expect(zRange(makeWheelMesh([2, 3, 4, 5, 8, 12, 18, 25]))).toEqual([0, 3]);
    expect(zRange(makeWheelMesh([10, 20], { thickness: 5 }))).toEqual([0, 5]);
  });

  it('reaches out to the widest prong tip', () => {
    // Tip sits at apothem + spike length along the face normal, offset by half the distance
    expect(maxRadius(makeWheelMesh([10, 20]))).toBeCloseTo(Math.hypot(33.5 + 16, 10), 5);
  });

  it('only references existing vertices', () => {
    const mesh = makeWheelMesh([2, 3, 4, 5, 8, 12, 18, 25]);
    const vertexCount = mesh.vertices.length / 3;
    expect(mesh.indices.length % 3).toBe(0);
    expect(mesh.indices.every((i) => i >= 0 && i < vertexCount)).toBe(true);
  });

  it('refuses a single distance', () => {
    expect(() => makeWheelMesh([5])).toThrow(ValidationError);
  });
});
