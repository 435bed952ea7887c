import * as THREE from 'three';
import type { SerializedMesh } from '../types';
import { MeshBuilder } from './meshbuilder';
import { glyphMetrics, textSegments } from './sevenseg';
import { validationError } from './errors';
import { MIN_DISTANCE_COUNT } from './distances';

/** Physical parameters of the wheel, in millimeters. */
export interface WheelOptions {
  acrossFlats: number; // Plate size measured between opposite faces
  thickness: number;
  spikeLength: number; // Prong length beyond the plate face
  baseWidth: number; // Prong width at the root
  rootOverlap: number; // How far the prong root reaches into the plate
  hubDiameter: number; // Thumb well
  thumbDepth: number;
  labelSize: number; // Digit height
  labelDepth: number;
  labelRadial: number; // Label position as a fraction of the apothem
  segments: number; // Facets for round features
}

export const DEFAULT_WHEEL_OPTIONS: Readonly<WheelOptions> = {
  acrossFlats: 67,
  thickness: 3,
  spikeLength: 16,
  baseWidth: 2.2,
  rootOverlap: 0,
  hubDiameter: 20,
  thumbDepth: 0.5,
  labelSize: 4,
  labelDepth: 0.5,
  labelRadial: 0.8,
  segments: 96,
};

/** A two-gon has no area, so a pair of distances goes on opposite faces of a square. */
export function plateSides(distanceCount: number): number {
  return distanceCount < 3 ? 4 : distanceCount;
}

/** Face that carries the i-th of n distances on a plate with the given number of sides. */
export function faceIndex(i: number, distanceCount: number, sides: number): number {
  return Math.round((i * sides) / distanceCount);
}

/** Angle of the outward normal of a plate face. Faces run clockwise. */
export function faceAngle(face: number, sides: number): number {
  return (-2 * Math.PI * (face + 0.5)) / sides;
}

/**
 * Builds the wheel: an n-gon plate with a pair of flat prongs on each face,
 * spaced by that face's distance, a thumb well on top and the rounded distance
 * engraved in seven-segment digits on both sides.
 *
 * Features are separate closed shells touching or overlapping the plate. No
 * boolean union is performed.
 */
export function makeWheelMesh(
  distances: readonly number[],
  options: Partial<WheelOptions> = {}
): SerializedMesh {
  if (distances.length < MIN_DISTANCE_COUNT) {
    throw validationError('Please enter at least two distances.', distances);
  }

  const opts: WheelOptions = { ...DEFAULT_WHEEL_OPTIONS, ...options };
  const builder = new MeshBuilder();
  const sides = plateSides(distances.length);
  const apothem = opts.acrossFlats / 2;
  const circumradius = opts.acrossFlats / (2 * Math.cos(Math.PI / sides));

  // Plate
  const plate: THREE.Vector3[] = [];
  for (let i = 0; i < sides; i++) {
    const angle = (2 * Math.PI * i) / sides;
    plate.push(new THREE.Vector3(circumradius * Math.cos(angle), circumradius * Math.sin(angle), 0));
  }
  builder.extrudePolygon(plate, 0, opts.thickness);

  // Prongs
  distances.forEach((separation, i) => {
    const angle = faceAngle(faceIndex(i, distances.length, sides), sides);
    addProngPair(builder, angle, apothem, separation, opts);
  });

  addThumbWell(builder, opts);

  // Labels on both sides
  const depth = engravingDepth(opts);
  distances.forEach((value, i) => {
    const angle = faceAngle(faceIndex(i, distances.length, sides), sides);
    const radius = opts.labelRadial * apothem;
    const center = new THREE.Vector3(radius * Math.cos(angle), radius * Math.sin(angle), 0);
    const outward = new THREE.Vector3(Math.cos(angle), Math.sin(angle), 0);
    const along = new THREE.Vector3(-Math.sin(angle), Math.cos(angle), 0);
    const text = String(Math.round(value));

    addEngraving(builder, text, center, outward, along, opts.thickness - depth, opts.thickness, opts);
    addEngraving(builder, text, center, outward, along, 0, depth, opts);
  });

  return builder.toSerializedMesh();
}

/** Labels are cut from both faces, so each may take at most half the plate. */
export function engravingDepth(opts: WheelOptions): number {
  return Math.min(opts.labelDepth, opts.thickness / 2 - 0.05);
}

function addProngPair(
  builder: MeshBuilder,
  angle: number,
  apothem: number,
  separation: number,
  opts: WheelOptions
) {
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  const cx = apothem * cos;
  const cy = apothem * sin;

  // Prong outline in face coordinates: x outward, y along the face
  const outline: Array<[number, number]> = [
    [-opts.rootOverlap, -opts.baseWidth / 2],
    [-opts.rootOverlap, opts.baseWidth / 2],
    [opts.spikeLength, 0],
  ];

  for (const sign of [1, -1]) {
    const prong = outline.map(([lx, ly]) => {
      const y = ly + (sign * separation) / 2;
      return new THREE.Vector3(cx + lx * cos - y * sin, cy + lx * sin + y * cos, 0);
    });
    builder.extrudePolygon(prong, 0, opts.thickness);
  }
}

function addThumbWell(builder: MeshBuilder, opts: WheelOptions) {
  const radius = opts.hubDiameter / 2;
  const z1 = opts.thickness;
  const z0 = z1 - opts.thumbDepth;
  const step = (2 * Math.PI) / opts.segments;
  const rim = (angle: number, z: number) =>
    new THREE.Vector3(radius * Math.cos(angle), radius * Math.sin(angle), z);

  for (let i = 0; i < opts.segments; i++) {
    const a0 = i * step;
    const a1 = (i + 1) * step;
    builder.addQuad(rim(a0, z0), rim(a1, z0), rim(a1, z1), rim(a0, z1));
  }

  const center = new THREE.Vector3(0, 0, z0);
  for (let i = 0; i < opts.segments; i++) {
    builder.addTriangle(center, rim((i + 1) * step, z0), rim(i * step, z0));
  }
}

/**
 * Cuts the digits of `text` as rectangular pockets between z0 and z1. Glyphs
 * read along the face, with their up direction pointing outwards.
 */
function addEngraving(
  builder: MeshBuilder,
  text: string,
  center: THREE.Vector3,
  outward: THREE.Vector3,
  along: THREE.Vector3,
  z0: number,
  z1: number,
  opts: WheelOptions
) {
  const toWorld = (u: number, v: number) =>
    center.clone().addScaledVector(along, u).addScaledVector(outward, v);

  for (const rect of textSegments(text, glyphMetrics(opts.labelSize))) {
    const du = rect.width / 2;
    const dv = rect.height / 2;
    const corners = [
      toWorld(rect.u - du, rect.v - dv),
      toWorld(rect.u + du, rect.v - dv),
      toWorld(rect.u + du, rect.v + dv),
      toWorld(rect.u - du, rect.v + dv),
    ];
    const bottom = corners.map((p) => new THREE.Vector3(p.x, p.y, z0));
    const top = corners.map((p) => new THREE.Vector3(p.x, p.y, z1));

    for (let i = 0; i < 4; i++) {
      const j = (i + 1) % 4;
      builder.addQuad(bottom[i], bottom[j], top[j], top[i]);
    }
    builder.addTriangle(bottom[0], bottom[2], bottom[1]);
    builder.addTriangle(bottom[0], bottom[3], bottom[2]);
    builder.addTriangle(top[0], top[1], top[2]);
    builder.addTriangle(top[0], top[2], top[3]);
  }
}
