import type { FileEntry, Manifest } from '../types';
import type { MapModel, Mappable } from './types';
import { unitRect } from './rect';
import { getDir, getFilename } from '../utils';

export type DirectoryWeight = 'bytes' | 'files';

export interface DirectoryItem extends Omit<Mappable, 'size'> {
  id: string;
  name: string;
  fileCount: number;
  bytes: number;
  // rewritten by dampening
  size: number;
}

export interface ManifestModelOptions {
  weight?: DirectoryWeight;
  dampen?: boolean;
}

export class ManifestModel implements MapModel<DirectoryItem> {
  constructor(private readonly items: DirectoryItem[]) {}

  getItems(): DirectoryItem[] {
    return this.items;
  }
}

export function groupByDirectory(files: readonly FileEntry[]): Manifest {
  const manifest: Manifest = {};
  for (const file of files) {
    const dir = getDir(file.path);
    (manifest[dir] ??= []).push(file);
  }
  return manifest;
}

export function buildManifestModel(manifest: Manifest, options: ManifestModelOptions = {}): ManifestModel {
  const weight = options.weight ?? 'bytes';
  const items: DirectoryItem[] = [];

  for (const [dir, files] of Object.entries(manifest)) {
    if (files.length === 0) continue;
    const bytes = files.reduce((sum, f) => sum + f.size, 0);
    items.push({
      id: dir,
      name: dir ? getFilename(dir) : 'Project Root',
      fileCount: files.length,
      bytes,
      size: weight === 'bytes' ? bytes : files.length,
      bounds: unitRect(),
    });
  }

  // Cube root keeps relative order but compresses ratios:
  // 1000:1 in weight becomes 10:1 in area.
  if (options.dampen && items.length >= 2) {
    for (const item of items) {
      item.size = Math.cbrt(item.size);
    }
  }

  items.sort((a, b) => b.size - a.size);
  return new ManifestModel(items);
}
