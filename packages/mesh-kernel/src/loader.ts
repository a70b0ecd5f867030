/**
 * Mesh loader — JSON geometry documents.
 *
 *   { "geometry_object": { "vertices": [x, y, z, ...], "triangles": [i, j, k, ...] } }
 *
 * Shape is checked with zod; the first issue decides the error kind.
 * Ragged arrays and dangling indices are rejected rather than trimmed.
 * Returned records already carry smooth normals.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Vec3 } from './vec3.js';
import { GeometryRecord, makeVertex } from './mesh.js';
import type { Vertex } from './mesh.js';
import { recalculateNormals } from './normals.js';
import { MeshLoadError } from './errors.js';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

export const meshDocumentSchema = z.object({
  geometry_object: z.object({
    vertices: z.array(z.number().finite()),
    triangles: z.array(z.number().int().min(INT32_MIN).max(INT32_MAX)),
  }),
});

export type MeshDocument = z.infer<typeof meshDocumentSchema>;

const decoder = new TextDecoder('utf-8', { fatal: true });

function issueToError(issue: z.ZodIssue, source?: string): MeshLoadError {
  const [root, field, element] = issue.path;
  const where = issue.path.join('.');

  if (root === undefined) {
    return new MeshLoadError('malformed', `Mesh document must be a JSON object: ${issue.message}`, { source });
  }
  if (element !== undefined) {
    if (field === 'vertices') {
      return new MeshLoadError(
        'invalid-vertex',
        `Vertex coordinate at ${where} is not a finite number: ${issue.message}`,
        { source },
      );
    }
    return new MeshLoadError(
      'invalid-index',
      `Triangle index at ${where} is not a 32-bit integer: ${issue.message}`,
      { source },
    );
  }
  const expected = field === undefined ? 'an object' : 'an array';
  return new MeshLoadError(
    'missing-field',
    `Expected ${expected} at "${where}": ${issue.message}`,
    { source },
  );
}

/** Build a record from an already-validated document. */
export function buildRecord(doc: MeshDocument, source?: string): GeometryRecord {
  const { vertices: coords, triangles } = doc.geometry_object;

  if (coords.length % 3 !== 0) {
    throw new MeshLoadError(
      'ragged-vertices',
      `Vertex array length ${coords.length} is not a multiple of 3`,
      { source },
    );
  }
  if (triangles.length % 3 !== 0) {
    throw new MeshLoadError(
      'ragged-indices',
      `Triangle array length ${triangles.length} is not a multiple of 3`,
      { source },
    );
  }

  const vertices: Vertex[] = [];
  for (let i = 0; i < coords.length; i += 3) {
    const p: Vec3 = [coords[i], coords[i + 1], coords[i + 2]];
    vertices.push(makeVertex(p));
  }

  for (let i = 0; i < triangles.length; i++) {
    const idx = triangles[i];
    if (idx < 0 || idx >= vertices.length) {
      throw new MeshLoadError(
        'index-out-of-range',
        `Triangle index ${idx} at position ${i} is outside [0, ${vertices.length})`,
        { source },
      );
    }
  }

  const record = new GeometryRecord(vertices, [...triangles]);
  recalculateNormals(record);
  return record;
}

/** Parse a mesh document from text or raw bytes. */
export function parseMesh(input: string | Uint8Array, source?: string): GeometryRecord {
  let text: string;
  if (typeof input === 'string') {
    text = input;
  } else {
    try {
      text = decoder.decode(input);
    } catch (err) {
      throw new MeshLoadError('malformed', 'Mesh document is not valid UTF-8', { source, cause: err });
    }
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MeshLoadError('malformed', `Failed to parse JSON: ${reason}`, { source, cause: err });
  }

  const parsed = meshDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw issueToError(parsed.error.issues[0], source);
  }
  return buildRecord(parsed.data, source);
}

/** Read and parse a mesh file. */
export async function loadMesh(path: string): Promise<GeometryRecord> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MeshLoadError('unreadable', `Failed to read mesh file "${path}": ${reason}`, {
      source: path,
      cause: err,
    });
  }
  return parseMesh(bytes, path);
}
