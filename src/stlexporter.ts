import * as THREE from 'three';
import { STL_FORMATS, type SerializedMesh, type StlFormat } from './types';
import { validationError } from './wheel/errors';

export interface STLExportOptions {
  scale?: number; // Scale factor for output (default: 1)
  name?: string; // Model name for STL header
}

const DEFAULT_NAME = 'two_point_wheel';

function triangleCorners(
  mesh: SerializedMesh,
  triangle: number,
  scale: number
): [THREE.Vector3, THREE.Vector3, THREE.Vector3] {
  const corner = (n: number) => {
    const idx = mesh.indices[triangle * 3 + n];
    return new THREE.Vector3(
      mesh.vertices[idx * 3],
      mesh.vertices[idx * 3 + 1],
      mesh.vertices[idx * 3 + 2]
    ).multiplyScalar(scale);
  };
  return [corner(0), corner(1), corner(2)];
}

function faceNormal(v1: THREE.Vector3, v2: THREE.Vector3, v3: THREE.Vector3): THREE.Vector3 {
  return new THREE.Vector3()
    .crossVectors(new THREE.Vector3().subVectors(v2, v1), new THREE.Vector3().subVectors(v3, v1))
    .normalize();
}

export function exportToSTL(mesh: SerializedMesh, options: STLExportOptions = {}): ArrayBuffer {
  const scale = options.scale ?? 1;
  const name = options.name ?? DEFAULT_NAME;
  const triangleCount = mesh.indices.length / 3; // Each triangle uses 3 indices

  // Binary STL format:
  // 80 bytes - Header
  // 4 bytes - Number of triangles (uint32)
  // For each triangle:
  //   12 bytes - Normal vector (3 floats)
  //   36 bytes - Vertices (9 floats)
  //   2 bytes - Attribute byte count (uint16)
  const HEADER_SIZE = 80;
  const COUNT_SIZE = 4;
  const TRIANGLE_SIZE = 12 + 36 + 2;
  const bufferSize = HEADER_SIZE + COUNT_SIZE + TRIANGLE_SIZE * triangleCount;

  const buffer = new ArrayBuffer(bufferSize);
  const view = new DataView(buffer);

  // Header, zero padded. Must not start with "solid" or readers take it for ASCII.
  const header = new TextEncoder().encode(name.startsWith('solid') ? `binary ${name}` : name);
  for (let i = 0; i < HEADER_SIZE; i++) {
    view.setUint8(i, i < header.length ? header[i] : 0);
  }

  view.setUint32(HEADER_SIZE, triangleCount, true);

  let offset = HEADER_SIZE + COUNT_SIZE;
  for (let t = 0; t < triangleCount; t++) {
    const [v1, v2, v3] = triangleCorners(mesh, t, scale);
    const normal = faceNormal(v1, v2, v3);

    for (const v of [normal, v1, v2, v3]) {
      view.setFloat32(offset, v.x, true);
      view.setFloat32(offset + 4, v.y, true);
      view.setFloat32(offset + 8, v.z, true);
      offset += 12;
    }

    // Attribute byte count (unused)
    view.setUint16(offset, 0, true);
    offset += 2;
  }

  return buffer;
}

function formatNumber(value: number): string {
  return value.toFixed(6);
}

function formatVector(v: THREE.Vector3): string {
  return `${formatNumber(v.x)} ${formatNumber(v.y)} ${formatNumber(v.z)}`;
}

export function exportToAsciiSTL(mesh: SerializedMesh, options: STLExportOptions = {}): string {
  const scale = options.scale ?? 1;
  const name = options.name ?? DEFAULT_NAME;
  const lines = [`solid ${name}`];

  for (let t = 0; t < mesh.indices.length / 3; t++) {
    const [v1, v2, v3] = triangleCorners(mesh, t, scale);
    lines.push(
      ` facet normal ${formatVector(faceNormal(v1, v2, v3))}`,
      '  outer loop',
      `   vertex ${formatVector(v1)}`,
      `   vertex ${formatVector(v2)}`,
      `   vertex ${formatVector(v3)}`,
      '  endloop',
      ' endfacet'
    );
  }

  lines.push(`endsolid ${name}`);
  return lines.join('\n') + '\n';
}

export function exportMesh(
  mesh: SerializedMesh,
  format: StlFormat,
  options: STLExportOptions = {}
): Uint8Array {
  if (format === 'ascii') {
    return new TextEncoder().encode(exportToAsciiSTL(mesh, options));
  }
  return new Uint8Array(exportToSTL(mesh, options));
}

export function isStlFormat(value: string): value is StlFormat {
  return STL_FORMATS.some((format) => format === value);
}

export function parseStlFormat(value: string): StlFormat {
  const format = value.trim().toLowerCase();
  if (!isStlFormat(format)) {
    throw validationError(`Unknown STL format "${value}". Use ${STL_FORMATS.join(' or ')}.`);
  }
  return format;
}
