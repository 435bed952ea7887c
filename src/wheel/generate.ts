import { writeFile } from 'fs/promises';
import type { StlFormat } from '../types';
import { exportMesh } from '../stlexporter';
import { validateDistances } from './distances';
import { makeWheelMesh, type WheelOptions } from './modeler';

export interface GenerateOptions {
  format?: StlFormat;
  scale?: number;
  name?: string;
  wheel?: Partial<WheelOptions>;
}

/** Validated distances rendered straight to STL bytes. */
export function renderWheelSTL(distances: readonly number[], options: GenerateOptions = {}): Uint8Array {
  const validated = validateDistances(distances);
  const mesh = makeWheelMesh(validated, options.wheel);
  return exportMesh(mesh, options.format ?? 'binary', { scale: options.scale, name: options.name });
}

/**
 * Writes the wheel for the given distances to `outputPath`.
 * @returns number of bytes written
 * @throws ValidationError when the distances are out of range
 */
export async function generateWheelSTL(
  distances: readonly number[],
  outputPath: string,
  options: GenerateOptions = {}
): Promise<number> {
  const data = renderWheelSTL(distances, options);
  await writeFile(outputPath, data);
  return data.byteLength;
}
