import path from "node:path";
import { diffArchive } from "../analyzers/archive.js";
import { listFiles } from "../analyzers/directory.js";
import type { AnalyzerContext } from "../analyzers/types.js";
import type { Finding } from "./finding.js";
import { sha256HexFile } from "./hashing.js";
import { ScanLocation } from "./location.js";

/** Added, Deleted, Modified, Renamed. */
export type DiffOperation = "A" | "D" | "M" | "R";

export type FileDiff = {
  operation: DiffOperation;
  /** Absolute paths on each side, null for the side a file is missing from. */
  a_path: string | null;
  b_path: string | null;
  /** Paths relative to the compared roots. */
  a_ref: string | null;
  b_ref: string | null;
  a_sha256: string | null;
  b_sha256: string | null;
  a_scan: ScanLocation;
  b_scan: ScanLocation;
};

export type DiffItem = { type: "diff"; diff: FileDiff } | { type: "finding"; finding: Finding };

type Side = Map<string, { abs: string; sha256: string }>;

function snapshot(location: ScanLocation): Side {
  const out: Side = new Map();
  if (location.isDirectory) {
    for (const file of listFiles(location.path)) {
      const ref = path.relative(location.path, file).split(path.sep).join("/");
      out.set(ref, { abs: file, sha256: sha256HexFile(file) });
    }
  } else {
    out.set(path.basename(location.path), { abs: location.path, sha256: sha256HexFile(location.path) });
  }
  return out;
}

/**
 * File level differences between two locations. Files are paired by relative
 * path; a deleted and an added file with identical content form a rename.
 * Two single files are always compared with each other.
 */
export function diffLocations(a: ScanLocation, b: ScanLocation): FileDiff[] {
  const left = snapshot(a);
  const right = snapshot(b);
  const diffs: FileDiff[] = [];
  const make = (operation: DiffOperation, aRef: string | null, bRef: string | null): FileDiff => {
    const l = aRef === null ? undefined : left.get(aRef);
    const r = bRef === null ? undefined : right.get(bRef);
    return {
      operation,
      a_path: l?.abs ?? null,
      b_path: r?.abs ?? null,
      a_ref: l ? aRef : null,
      b_ref: r ? bRef : null,
      a_sha256: l?.sha256 ?? null,
      b_sha256: r?.sha256 ?? null,
      a_scan: a,
      b_scan: b
    };
  };

  if (!a.isDirectory && !b.isDirectory) {
    const [aRef] = [...left.keys()];
    const [bRef] = [...right.keys()];
    if (left.get(aRef)?.sha256 === right.get(bRef)?.sha256) return [];
    return [make(aRef === bRef ? "M" : "R", aRef, bRef)];
  }

  const deleted: string[] = [];
  const added = new Set<string>();
  for (const ref of right.keys()) if (!left.has(ref)) added.add(ref);

  for (const [ref, entry] of left) {
    const other = right.get(ref);
    if (other === undefined) deleted.push(ref);
    else if (other.sha256 !== entry.sha256) diffs.push(make("M", ref, ref));
  }

  for (const ref of deleted) {
    const sha = left.get(ref)?.sha256;
    const renamed = [...added].find((candidate) => right.get(candidate)?.sha256 === sha);
    if (renamed !== undefined) {
      added.delete(renamed);
      diffs.push(make("R", ref, renamed));
    } else {
      diffs.push(make("D", ref, null));
    }
  }
  for (const ref of added) diffs.push(make("A", null, ref));

  return diffs.sort((x, y) => {
    const kx = x.a_ref ?? x.b_ref ?? "";
    const ky = y.a_ref ?? y.b_ref ?? "";
    return kx < ky ? -1 : kx > ky ? 1 : 0;
  });
}

/**
 * Walks the differences between two scans. Modified archives are unpacked on
 * both sides and the unpacked trees are diffed recursively, up to the
 * configured archive depth.
 */
export async function* diffScan(a: ScanLocation, b: ScanLocation, ctx: AnalyzerContext): AsyncGenerator<DiffItem> {
  for (const diff of diffLocations(a, b)) {
    yield { type: "diff", diff };
    for await (const item of diffArchive(diff, ctx)) {
      if (!(item instanceof ScanLocation)) {
        yield { type: "finding", finding: item };
        continue;
      }
      const pair = item.pair;
      try {
        if (pair !== null) yield* diffScan(item, pair, ctx);
      } finally {
        item.release();
        pair?.release();
      }
    }
  }
}
