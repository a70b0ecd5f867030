/** Mesh library — the .json documents in an input directory. */

import { readdir } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import * as path from 'node:path';
import { MeshLoadError } from './errors.js';

export interface MeshFileEntry {
  /** File name with extension: "teapot.json". */
  name: string;
  /** Display name without extension: "teapot". */
  stem: string;
  path: string;
}

export async function listMeshFiles(dir: string): Promise<MeshFileEntry[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MeshLoadError('unreadable', `Failed to list mesh directory "${dir}": ${reason}`, {
      source: dir,
      cause: err,
    });
  }

  return entries
    .filter((e) => e.isFile() && path.extname(e.name).toLowerCase() === '.json')
    .map((e) => ({
      name: e.name,
      stem: path.basename(e.name, path.extname(e.name)),
      path: path.join(dir, e.name),
    }))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
