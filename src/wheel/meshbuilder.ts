import * as THREE from 'three';
import type { SerializedMesh } from '../types';

/**
 * Accumulates triangles into an indexed mesh, sharing vertices that land on
 * the same position (to 1e-6 mm).
 */
export class MeshBuilder {
  private vertices: number[] = [];
  private indices: number[] = [];
  private vertexCache = new Map<string, number>();

  get triangleCount(): number {
    return this.indices.length / 3;
  }

  get vertexCount(): number {
    return this.vertices.length / 3;
  }

  addVertex(pos: THREE.Vector3): number {
    const key = `${pos.x.toFixed(6)},${pos.y.toFixed(6)},${pos.z.toFixed(6)}`;
    const cached = this.vertexCache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const index = this.vertices.length / 3;
    this.vertices.push(pos.x, pos.y, pos.z);
    this.vertexCache.set(key, index);
    return index;
  }

  addTriangle(a: THREE.Vector3, b: THREE.Vector3, c: THREE.Vector3): void {
    this.indices.push(this.addVertex(a), this.addVertex(b), this.addVertex(c));
  }

  // Split along the v0-v2 diagonal
  addQuad(v0: THREE.Vector3, v1: THREE.Vector3, v2: THREE.Vector3, v3: THREE.Vector3): void {
    this.addTriangle(v0, v1, v2);
    this.addTriangle(v0, v2, v3);
  }

  /**
   * Extrudes a convex polygon in the XY plane between z0 and z1. The input
   * winding does not matter; z coordinates of the input are ignored.
   */
  extrudePolygon(polygon: readonly THREE.Vector3[], z0: number, z1: number): void {
    if (polygon.length < 3) return;

    const outline = signedArea(polygon) < 0 ? [...polygon].reverse() : polygon;
    const bottom = outline.map((p) => new THREE.Vector3(p.x, p.y, z0));
    const top = outline.map((p) => new THREE.Vector3(p.x, p.y, z1));

    for (let i = 1; i < bottom.length - 1; i++) {
      this.addTriangle(bottom[0], bottom[i + 1], bottom[i]);
    }
    for (let i = 1; i < top.length - 1; i++) {
      this.addTriangle(top[0], top[i], top[i + 1]);
    }
    for (let i = 0; i < outline.length; i++) {
      const j = (i + 1) % outline.length;
      this.addQuad(bottom[i], bottom[j], top[j], top[i]);
    }
  }

  toSerializedMesh(): SerializedMesh {
    return { vertices: [...this.vertices], indices: [...this.indices] };
  }
}

/** Shoelace area of the polygon's XY projection, positive when counter-clockwise. */
export function signedArea(polygon: readonly THREE.Vector3[]): number {
  let area = 0;
  for (let i = 0; i < polygon.length; i++) {
    const j = (i + 1) % polygon.length;
    area += polygon[i].x * polygon[j].y - polygon[j].x * polygon[i].y;
  }
  return area / 2;
}
