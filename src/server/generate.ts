import { join } from 'path';
import { readFile } from 'fs/promises';
import { NextResponse } from 'next/server';
import type { StlFormat } from '../types';
import { parseStlFormat } from '../stlexporter';
import { readDistances } from '../wheel/distances';
import { generateWheelSTL } from '../wheel/generate';
import { isInputError, validationError } from '../wheel/errors';
import { withTempDir } from '../utils/tempdir';
import { loadConfig, type ServerConfig } from '../utils/config';

/** Field names accepted for the distance list, newest first. */
const DISTANCE_FIELDS = ['distances_mm', 'distances'] as const;

export interface WheelRequest {
  distances: string | null;
  format: string | null;
}

function fieldValue(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (Array.isArray(value) && value.every((v) => typeof v === 'number' || typeof v === 'string')) {
    return value.join(',');
  }
  return null;
}

async function readBody<T>(read: () => Promise<T>): Promise<T> {
  try {
    return await read();
  } catch (error) {
    console.error('Unreadable request body:', error);
    throw validationError('Could not read the request body.');
  }
}

/** Pulls the distance list and optional format out of a form or JSON body. */
export async function readWheelRequest(request: Request): Promise<WheelRequest> {
  const contentType = request.headers.get('content-type') ?? '';

  if (contentType.includes('application/json')) {
    const body: unknown = await readBody(() => request.json());
    if (typeof body !== 'object' || body === null) {
      return { distances: null, format: null };
    }
    const fields = new Map<string, unknown>(Object.entries(body));
    const distances = DISTANCE_FIELDS.map((name) => fieldValue(fields.get(name))).find(
      (value) => value !== null
    );
    return { distances: distances ?? null, format: fieldValue(fields.get('format')) };
  }

  const form = await readBody(() => request.formData());
  const distances = DISTANCE_FIELDS.map((name) => form.get(name)).find(
    (value): value is string => typeof value === 'string'
  );
  const format = form.get('format');
  return {
    distances: distances ?? null,
    format: typeof format === 'string' && format.trim() !== '' ? format : null,
  };
}

function badRequest(message: string) {
  return NextResponse.json({ error: message }, { status: 400 });
}

/**
 * Turns a submitted distance list into an STL download. The mesh is written to
 * a per-request temporary directory that is removed before the response is sent.
 */
export async function generateWheelResponse(
  request: Request,
  settings?: ServerConfig
): Promise<Response> {
  try {
    const config = settings ?? loadConfig();
    const input = await readWheelRequest(request);
    if (input.distances === null) {
      return badRequest(`Missing form field "${DISTANCE_FIELDS[0]}".`);
    }

    const distances = readDistances(input.distances);
    const format: StlFormat = input.format ? parseStlFormat(input.format) : config.format;

    const stl = await withTempDir(async (dir) => {
      const outputPath = join(dir, config.downloadName);
      await generateWheelSTL(distances, outputPath, { format });
      return readFile(outputPath);
    });

    console.log(
      `Generated ${format} wheel for [${distances.join(', ')}] mm (${stl.byteLength} bytes)`
    );

    return new NextResponse(new Uint8Array(stl), {
      status: 200,
      headers: {
        'Content-Type': 'model/stl',
        'Content-Disposition': `attachment; filename="${config.downloadName}"`,
        'Content-Length': String(stl.byteLength),
        'Cache-Control': 'no-cache',
      },
    });
  } catch (error) {
    if (isInputError(error)) {
      return badRequest(error.message);
    }
    console.error('Wheel generation error:', error);
    return NextResponse.json({ error: 'Failed to generate wheel STL' }, { status: 500 });
  }
}
