import { readdirSync } from "fs";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** An output filename split into its parts */
export interface OutputName {
  filename: string;
  baseName: string;
  sequence: number;
  /** Extension including the leading dot, or "" */
  extension: string;
}

/** Highest sequence number seen per base name */
export type SequenceIndex = Map<string, number>;

export interface SequenceAllocator {
  /** Sequence number the next successful write for this base name should use */
  next(baseName: string): number;
  /** Record that a file with this sequence number now exists */
  commit(baseName: string, sequence: number): void;
  /** Highest committed or pre-existing sequence number (0 if none) */
  highest(baseName: string): number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Minimum digits in a sequence number; wider numbers are never truncated */
export const SEQUENCE_WIDTH = 3;

/** Base name used when sanitizing leaves nothing */
export const FALLBACK_BASE_NAME = "unnamed";

const OUTPUT_NAME_PATTERN = /^(.+)_(\d{3,})(\.[A-Za-z0-9]+)?$/;

// ---------------------------------------------------------------------------
// Naming
// ---------------------------------------------------------------------------

/**
 * Turn a raw name-column value into a filesystem-safe stem.
 *
 * Lowercases, collapses every run of characters outside [a-z0-9] into a
 * single underscore and trims underscores from both ends.
 */
export function sanitizeBaseName(raw: string): string {
  const sanitized = raw
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return sanitized || FALLBACK_BASE_NAME;
}

export function formatSequence(sequence: number): string {
  return String(sequence).padStart(SEQUENCE_WIDTH, "0");
}

export function formatOutputFilename(
  baseName: string,
  sequence: number,
  extension: string
): string {
  return `${baseName}_${formatSequence(sequence)}${extension}`;
}

/**
 * Split `<base>_<NNN><ext>` back into its parts.
 * Returns undefined for names that were not produced by the downloader.
 */
export function parseOutputFilename(filename: string): OutputName | undefined {
  const match = OUTPUT_NAME_PATTERN.exec(filename);
  if (!match) return undefined;

  return {
    filename,
    baseName: match[1],
    sequence: parseInt(match[2], 10),
    extension: match[3] ?? "",
  };
}

// ---------------------------------------------------------------------------
// Existing Outputs
// ---------------------------------------------------------------------------

export interface DirectoryListing {
  outputs: OutputName[];
  /** Regular files whose names don't follow the scheme */
  ignored: string[];
}

/**
 * Split the regular files in a directory into outputs and everything else.
 * A missing directory is empty.
 */
export function listDirectory(dir: string): DirectoryListing {
  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return { outputs: [], ignored: [] };
    }
    throw error;
  }

  const listing: DirectoryListing = { outputs: [], ignored: [] };
  for (const entry of entries) {
    if (!entry.isFile()) continue;
    const parsed = parseOutputFilename(entry.name);
    if (parsed) {
      listing.outputs.push(parsed);
    } else {
      listing.ignored.push(entry.name);
    }
  }
  return listing;
}

/**
 * Scan a directory for previous downloads and record the highest sequence
 * number per base name. Re-runs continue numbering from here.
 */
export function scanExistingOutputs(dir: string): SequenceIndex {
  const index: SequenceIndex = new Map();
  for (const output of listDirectory(dir).outputs) {
    const current = index.get(output.baseName) ?? 0;
    if (output.sequence > current) {
      index.set(output.baseName, output.sequence);
    }
  }
  return index;
}

/**
 * Highest sequence per base name across several indexes.
 */
export function mergeSequenceIndexes(...indexes: SequenceIndex[]): SequenceIndex {
  const merged: SequenceIndex = new Map();
  for (const index of indexes) {
    for (const [baseName, sequence] of index) {
      if (sequence > (merged.get(baseName) ?? 0)) {
        merged.set(baseName, sequence);
      }
    }
  }
  return merged;
}

/**
 * Create an allocator seeded from a scan of existing outputs.
 * Numbers are only consumed through commit, so a failed download
 * leaves the next number unchanged.
 */
export function createSequenceAllocator(
  initial: SequenceIndex = new Map()
): SequenceAllocator {
  const highestSeen: SequenceIndex = new Map(initial);

  function highest(baseName: string): number {
    return highestSeen.get(baseName) ?? 0;
  }

  return {
    next: (baseName) => highest(baseName) + 1,
    commit(baseName, sequence) {
      if (sequence > highest(baseName)) {
        highestSeen.set(baseName, sequence);
      }
    },
    highest,
  };
}

// ---------------------------------------------------------------------------
// Grouping
// ---------------------------------------------------------------------------

/**
 * Group outputs by base name, each group sorted by sequence ascending.
 */
export function groupByBaseName(outputs: OutputName[]): Map<string, OutputName[]> {
  const groups = new Map<string, OutputName[]>();
  for (const output of outputs) {
    const group = groups.get(output.baseName);
    if (group) {
      group.push(output);
    } else {
      groups.set(output.baseName, [output]);
    }
  }
  for (const group of groups.values()) {
    group.sort((a, b) => a.sequence - b.sequence || a.filename.localeCompare(b.filename));
  }
  return groups;
}
