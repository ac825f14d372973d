import fg from "fast-glob";

export interface ListEntriesOptions {
  /** Include names starting with a dot */
  readonly dot?: boolean;
}

/**
 * Top-level names of a directory that a shell `*` would match: files,
 * directories and links alike, dot entries excluded unless asked for.
 * Sorted.
 */
export async function listVisibleEntries(dir: string, options: ListEntriesOptions = {}): Promise<string[]> {
  const names = await fg("*", {
    cwd: dir,
    onlyFiles: false,
    dot: options.dot ?? false,
    deep: 1,
    followSymbolicLinks: false,
  });
  return names.sort();
}
