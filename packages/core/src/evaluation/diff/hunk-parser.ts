/**
 * Mapping from file path (the `+++ b/<path>` side of a unified diff) to the
 * hunk texts recorded for that file, in order of appearance.
 */
export type HunkMap = ReadonlyMap<string, readonly string[]>;

const NEW_FILE_HEADER = /^\+\+\+\s+b\/(.+)$/;
const DELETED_FILE_HEADER = /^\+\+\+\s+\/dev\/null\s*$/;
const OLD_FILE_HEADER_PREFIX = '--- ';
const HUNK_HEADER_PREFIX = '@@';

function isHunkBodyLine(line: string): boolean {
  return line.startsWith('+') || line.startsWith('-') || line.startsWith(' ');
}

function isFileHeaderPair(lines: readonly string[], index: number): boolean {
  const next = lines[index + 1];
  return (
    lines[index].startsWith(OLD_FILE_HEADER_PREFIX) &&
    next !== undefined &&
    (NEW_FILE_HEADER.test(next) || DELETED_FILE_HEADER.test(next))
  );
}

/**
 * Parse unified diff text into a {@link HunkMap}.
 *
 * Only `+++ b/<path>` lines open a file section, so a renamed file is keyed by
 * its new path; a `--- ` line directly followed by `+++ b/<path>` or
 * `+++ /dev/null` is treated as header metadata. Inside a hunk, a removed
 * `-- comment` line next to an added `++ text` line stays body content. A deleted file (`+++ /dev/null`) opens no section, so its
 * hunks stay with the section that is already open. Any other line outside a
 * hunk is dropped. Malformed input never throws; it yields a partial or empty
 * map.
 */
export function parseFileHunks(diffText: string): HunkMap {
  const files = new Map<string, string[]>();
  if (!diffText || diffText.trim().length === 0) {
    return files;
  }

  let currentFile: string | undefined;
  let currentHunks: string[] = [];
  let hunkBuffer: string[] = [];

  const finalizeHunk = () => {
    if (hunkBuffer.length > 0) {
      currentHunks.push(hunkBuffer.join('\n'));
    }
    hunkBuffer = [];
  };

  const flushFile = () => {
    if (currentFile === undefined) {
      return;
    }
    const existing = files.get(currentFile);
    if (existing) {
      existing.push(...currentHunks);
    } else {
      files.set(currentFile, currentHunks);
    }
  };

  const lines = diffText.split(/\r\n|\r|\n/);
  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];

    // `--- a/x` / `+++ /dev/null` header pairs are metadata, not hunk body lines
    if (isFileHeaderPair(lines, index)) {
      if (!NEW_FILE_HEADER.test(lines[index + 1])) {
        index++;
      }
      continue;
    }

    const header = NEW_FILE_HEADER.exec(line);
    if (header) {
      if (currentFile !== undefined) {
        finalizeHunk();
        flushFile();
      }
      currentFile = header[1].trim();
      currentHunks = [];
      hunkBuffer = [];
      continue;
    }

    if (line.startsWith(HUNK_HEADER_PREFIX)) {
      finalizeHunk();
      hunkBuffer = [line];
      continue;
    }

    if (currentFile !== undefined && isHunkBodyLine(line)) {
      hunkBuffer.push(line);
    }
  }

  if (currentFile !== undefined) {
    finalizeHunk();
    flushFile();
  }

  return files;
}

/**
 * Total number of hunks across every file in the map.
 */
export function countHunks(map: HunkMap): number {
  let total = 0;
  for (const hunks of map.values()) {
    total += hunks.length;
  }
  return total;
}
