import { existsSync, readdirSync, statSync } from "node:fs";
import { extname, join, resolve } from "node:path";

export const FILE_KINDS = ["word", "pdf", "excel", "markdown", "txt"] as const;

export type FileKind = (typeof FILE_KINDS)[number];

/** Extensions the server knows how to chunk, grouped by document kind */
export const SUPPORTED_FILE_TYPES: Record<FileKind, readonly string[]> = {
  word: [".doc", ".docx"],
  pdf: [".pdf"],
  excel: [".xls", ".xlsx"],
  markdown: [".md"],
  txt: [".txt"],
};

const KIND_BY_EXT = new Map<string, FileKind>(
  FILE_KINDS.flatMap((kind) => SUPPORTED_FILE_TYPES[kind].map((ext) => [ext, kind] as const))
);

export const SUPPORTED_EXTENSIONS: readonly string[] = [...KIND_BY_EXT.keys()];

export function fileKind(path: string): FileKind | undefined {
  return KIND_BY_EXT.get(extname(path).toLowerCase());
}

export function isSupported(path: string): boolean {
  return fileKind(path) !== undefined;
}

export interface DirectoryScan {
  dir: string;
  supported: string[];
  skipped: string[];
}

/**
 * List the regular files directly inside `dir` (no recursion) and split them
 * by extension. Paths come back absolute and sorted by name.
 */
export function scanDirectory(dir: string): DirectoryScan {
  const root = resolve(dir);

  if (!existsSync(root)) {
    throw new Error(`Directory not found: ${root}`);
  }
  if (!statSync(root).isDirectory()) {
    throw new Error(`Not a directory: ${root}`);
  }

  const supported: string[] = [];
  const skipped: string[] = [];

  for (const entry of readdirSync(root).sort()) {
    const full = join(root, entry);
    // dangling links and entries removed since readdir have no stats
    if (!statSync(full, { throwIfNoEntry: false })?.isFile()) continue;
    (isSupported(entry) ? supported : skipped).push(full);
  }

  return { dir: root, supported, skipped };
}
