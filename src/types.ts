export interface FileEntry {
  path: string;
  desc: string;
  size: number;
}

/** Files grouped by the directory that holds them. */
export type Manifest = Record<string, FileEntry[]>;
