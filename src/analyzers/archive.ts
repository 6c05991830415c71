import fs from "node:fs";
import path from "node:path";
import zlib from "node:zlib";
import AdmZip from "adm-zip";
import tar from "tar-stream";
import bz2 from "unbzip2-stream";
import { buildSignature, createFinding, errorDetails, type Finding } from "../lib/finding.js";
import type { FileDiff } from "../lib/diff.js";
import { ScanLocation } from "../lib/location.js";
import { getMaximumArchiveSize, getScoreOrDefault, type Settings } from "../lib/settings.js";
import type { Analyzer, AnalyzerContext, ScanItem } from "./types.js";

export const SUPPORTED_MIME = ["application/x-gzip", "application/gzip", "application/x-bzip2", "application/zip"] as const;

export type ArchiveMime = (typeof SUPPORTED_MIME)[number];

export function isSupportedArchive(mime: string): mime is ArchiveMime {
  return SUPPORTED_MIME.some((m) => m === mime);
}

export type EntryVerdict =
  | { action: "extract"; directory: boolean }
  | { action: "reject"; finding: Finding }
  | { action: "skip"; reason: string };

type TarHeader = { name: string; size?: number; type?: string | null };

function normalizeEntryPath(entryPath: string): string {
  return entryPath.replace(/\\/g, "/");
}

/**
 * Absolute paths and `..` components. Returns the finding for a suspicious
 * entry, null otherwise.
 */
export function isSuspicious(entryPath: string, archivePath: string, settings: Settings): Finding | null {
  const norm = normalizeEntryPath(entryPath);

  if (norm.startsWith("/") || /^[A-Za-z]:\//.test(norm)) {
    return createFinding({
      type: "SuspiciousArchiveEntry",
      location: archivePath,
      message: "Archive contains an entry with an absolute path",
      signature: buildSignature("suspicious_archive_entry", "absolute_path", norm, archivePath),
      score: getScoreOrDefault(settings, "suspicious-archive-entry-absolute-path", 50),
      extra: { entry_type: "absolute_path", entry_path: norm }
    });
  }

  if (norm.split("/").some((part) => part === "..")) {
    return createFinding({
      type: "SuspiciousArchiveEntry",
      location: archivePath,
      message: "Archive contains an entry referencing a parent directory",
      signature: buildSignature("suspicious_archive_entry", "parent_reference", norm, archivePath),
      score: getScoreOrDefault(settings, "suspicious-archive-entry-parent-reference", 50),
      extra: { entry_type: "parent_reference", entry_path: norm }
    });
  }

  return null;
}

function oversized(archivePath: string, entryPath: string, size: number, limit: number, score: number): Finding {
  return createFinding({
    type: "ArchiveAnomaly",
    location: archivePath,
    message: "Archive contain a file that exceed the configured maximum size",
    signature: buildSignature("archive_anomaly", "size", archivePath, entryPath),
    score,
    extra: {
      archive_path: entryPath,
      reason: "file_size_exceeded",
      size,
      limit
    }
  });
}

export function classifyZipEntry(
  entry: { name: string; size: number; isDirectory: boolean },
  archivePath: string,
  maxSize: number | null,
  settings: Settings
): EntryVerdict {
  const suspicious = isSuspicious(entry.name, archivePath, settings);
  if (suspicious) return { action: "reject", finding: suspicious };
  if (maxSize !== null && entry.size > maxSize) {
    const score = getScoreOrDefault(settings, "archive-entry-size-exceeded", 10);
    return { action: "reject", finding: oversized(archivePath, entry.name, entry.size, maxSize, score) };
  }
  return { action: "extract", directory: entry.isDirectory };
}

export function classifyTarEntry(header: TarHeader, archivePath: string, maxSize: number | null, settings: Settings): EntryVerdict {
  const suspicious = isSuspicious(header.name, archivePath, settings);
  if (suspicious) return { action: "reject", finding: suspicious };

  const type = header.type ?? "file";
  if (type === "directory") return { action: "extract", directory: true };
  if (type === "symlink" || type === "link") return { action: "skip", reason: type };
  if (type === "file" || type === "contiguous-file") {
    const size = header.size ?? 0;
    if (maxSize !== null && size > maxSize) {
      const score = getScoreOrDefault(settings, "archive-file-size-exceeded", 100);
      return { action: "reject", finding: oversized(archivePath, header.name, size, maxSize, score) };
    }
    return { action: "extract", directory: false };
  }
  return { action: "skip", reason: type };
}

/** Resolves an entry inside the extraction root, or null when it would land outside of it. */
export function extractionTarget(root: string, entryPath: string): string | null {
  const target = path.resolve(root, normalizeEntryPath(entryPath));
  const rel = path.relative(root, target);
  if (rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) return null;
  return target;
}

function extractErrorFinding(archivePath: string, entryPath: string, e: unknown, settings: Settings): Finding {
  return createFinding({
    type: "ArchiveAnomaly",
    location: archivePath,
    message: "Archive entry could not be extracted",
    signature: buildSignature("archive_anomaly", "extract_error", archivePath, entryPath),
    score: getScoreOrDefault(settings, "archive-extract-error", 10),
    extra: { archive_path: entryPath, reason: "extract_error", ...errorDetails(e) }
  });
}

/**
 * Writes one approved entry. Failures stay with the entry so the rest of the
 * archive is still classified; they come back as a finding.
 */
function writeEntry(
  root: string,
  archivePath: string,
  entryPath: string,
  directory: boolean,
  data: () => Buffer | null,
  ctx: AnalyzerContext
): Finding | null {
  const target = extractionTarget(root, entryPath);
  if (target === null) {
    ctx.logger.warn(`Refusing to extract outside of the sandbox entry=${entryPath}`);
    return null;
  }
  try {
    if (directory) {
      fs.mkdirSync(target, { recursive: true });
    } else {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, data() ?? Buffer.alloc(0));
    }
    return null;
  } catch (e) {
    ctx.logger.debug(`Entry extraction failed archive=${archivePath} entry=${entryPath} error=${errorDetails(e).exc_message}`);
    return extractErrorFinding(archivePath, entryPath, e, ctx.settings);
  }
}

export async function* processZip(
  archivePath: string,
  tmpDir: string,
  maxSize: number | null,
  ctx: AnalyzerContext
): AsyncGenerator<Finding> {
  const zip = new AdmZip(archivePath);
  for (const entry of zip.getEntries()) {
    const verdict = classifyZipEntry(
      { name: entry.entryName, size: entry.header.size, isDirectory: entry.isDirectory },
      archivePath,
      maxSize,
      ctx.settings
    );
    if (verdict.action === "reject") {
      yield verdict.finding;
    } else if (verdict.action === "extract") {
      const failure = writeEntry(tmpDir, archivePath, entry.entryName, verdict.directory, () => (verdict.directory ? null : entry.getData()), ctx);
      if (failure !== null) yield failure;
    }
  }
}

type PendingEntry = {
  header: TarHeader;
  stream: AsyncIterable<unknown>;
  next: () => void;
};

async function readAll(stream: AsyncIterable<unknown>): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    if (Buffer.isBuffer(chunk)) chunks.push(chunk);
    else if (typeof chunk === "string") chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

async function drain(stream: AsyncIterable<unknown>): Promise<void> {
  for await (const _chunk of stream) {
    // discard
  }
}

/**
 * Streams a compressed tarball through tar-stream. Entries are handled one at a
 * time in archive order; the extractor only moves on after `next()`.
 */
export async function* processTar(
  archivePath: string,
  mime: ArchiveMime,
  tmpDir: string,
  maxSize: number | null,
  ctx: AnalyzerContext
): AsyncGenerator<Finding> {
  const source = fs.createReadStream(archivePath);
  const decompress: NodeJS.ReadWriteStream = mime === "application/x-bzip2" ? bz2() : zlib.createGunzip();
  const extract = tar.extract();

  const queue: PendingEntry[] = [];
  const state: { done: boolean; failure: Error | null } = { done: false, failure: null };
  let wake: (() => void) | null = null;
  const notify = () => {
    const resolve = wake;
    wake = null;
    resolve?.();
  };
  const fail = (err: Error) => {
    state.failure ??= err;
    state.done = true;
    notify();
  };

  extract.on("entry", (header, stream, next) => {
    queue.push({ header, stream, next });
    notify();
  });
  extract.on("finish", () => {
    state.done = true;
    notify();
  });
  extract.on("close", () => {
    state.done = true;
    notify();
  });
  extract.on("error", fail);
  source.on("error", (err) => extract.destroy(err));
  decompress.on("error", (err: Error) => extract.destroy(err));

  source.pipe(decompress).pipe(extract);

  try {
    for (;;) {
      if (state.failure) throw state.failure;
      const entry = queue.shift();
      if (entry === undefined) {
        if (state.done) return;
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        continue;
      }

      const verdict = classifyTarEntry(entry.header, archivePath, maxSize, ctx.settings);
      let failure: Finding | null = null;
      if (verdict.action === "extract" && !verdict.directory) {
        const data = await readAll(entry.stream);
        failure = writeEntry(tmpDir, archivePath, entry.header.name, false, () => data, ctx);
      } else {
        await drain(entry.stream);
        if (verdict.action === "extract") failure = writeEntry(tmpDir, archivePath, entry.header.name, true, () => null, ctx);
        if (verdict.action === "skip") ctx.logger.debug(`Skipping tar entry type=${verdict.reason} entry=${entry.header.name}`);
      }
      entry.next();
      if (verdict.action === "reject") yield verdict.finding;
      if (failure !== null) yield failure;
    }
  } finally {
    source.unpipe();
    source.destroy();
    if ("destroy" in decompress && typeof decompress.destroy === "function") decompress.destroy();
    extract.destroy();
  }
}

function readErrorFinding(location: ScanLocation, e: unknown, settings: Settings): Finding {
  return createFinding({
    type: "ArchiveAnomaly",
    location: location.path,
    message: "Could not open the archive for analysis",
    signature: buildSignature("archive_anomaly", "read_error", location.path),
    score: getScoreOrDefault(settings, "corrupted-archive", 10),
    extra: {
      reason: "archive_read_error",
      ...errorDetails(e),
      mime: location.metadata.mime
    }
  });
}

/**
 * Unpacks a supported archive into a fresh directory owned by a child location.
 * The child is yielded before extraction starts; anomalies follow in archive
 * order. `maxSize` overrides the configured entry size limit.
 */
export async function* analyzeArchive(location: ScanLocation, ctx: AnalyzerContext, maxSize?: number | null): AsyncGenerator<ScanItem> {
  if (location.isDirectory) return;
  const mime = location.metadata.mime;
  if (!isSupportedArchive(mime)) return;

  const limit = maxSize === undefined ? getMaximumArchiveSize(ctx.settings) : maxSize;
  if (location.archiveDepth >= ctx.settings.max_depth) {
    yield createFinding({
      type: "ArchiveAnomaly",
      location: location.path,
      message: "Archive nesting exceeds the configured maximum depth",
      signature: buildSignature("archive_anomaly", "max_depth", location.path),
      score: getScoreOrDefault(ctx.settings, "archive-max-depth-exceeded", 10),
      extra: { reason: "max_depth_exceeded", depth: location.archiveDepth, limit: ctx.settings.max_depth }
    });
    return;
  }

  const tmpDir = fs.mkdtempSync(path.join(ctx.tmpRoot, "halo-sandbox-"));
  ctx.logger.info(`Extracting archive path=${location.path} into=${tmpDir} mime=${mime}`);
  let child: ScanLocation;
  try {
    child = await location.createChild(tmpDir, { cleanup: true });
  } catch (e) {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    throw e;
  }
  yield child;

  try {
    if (mime === "application/zip") yield* processZip(location.path, tmpDir, limit, ctx);
    else yield* processTar(location.path, mime, tmpDir, limit, ctx);
  } catch (e) {
    ctx.logger.debug(`Archive read failed path=${location.path} error=${errorDetails(e).exc_message}`);
    yield readErrorFinding(location, e, ctx.settings);
  }
}

export const archiveAnalyzer: Analyzer = {
  id: "archive",
  description: "Unpacks zip and tar archives, reporting entries that are unsafe to extract",
  analyze: (location, ctx) => analyzeArchive(location, ctx)
};

/**
 * Differential mode: runs both sides of a modified archive through the archive
 * pipeline, reports every anomaly of both, then yields one location whose
 * `pair` is the other side so the caller can diff the unpacked trees.
 * The caller releases the yielded location and its pair.
 */
export async function* diffArchive(diff: FileDiff, ctx: AnalyzerContext): AsyncGenerator<ScanItem> {
  if (diff.operation !== "R" && diff.operation !== "M") return;
  if (diff.a_sha256 === diff.b_sha256) return;
  if (diff.a_path === null || diff.b_path === null) return;

  const aLoc = await diff.a_scan.createChild(diff.a_path);
  const owned: ScanLocation[] = [aLoc];
  try {
    const bLoc = await diff.b_scan.createChild(diff.b_path);
    owned.push(bLoc);

    const collect = async (location: ScanLocation) => {
      const findings: Finding[] = [];
      const locations: ScanLocation[] = [];
      for await (const item of analyzeArchive(location, ctx)) {
        if (item instanceof ScanLocation) {
          owned.push(item);
          locations.push(item);
        } else {
          findings.push(item);
        }
      }
      return { findings, locations };
    };

    const a = await collect(aLoc);
    const b = await collect(bLoc);
    yield* a.findings;
    yield* b.findings;

    if (a.locations.length === 0 && b.locations.length === 0) return;

    // Prefer the unpacked directory over the raw archive on each side.
    const pairA = a.locations[0] ?? aLoc;
    const pairB = b.locations[0] ?? bLoc;
    pairA.pair = pairB;
    owned.splice(0, owned.length, ...owned.filter((loc) => loc !== pairA && loc !== pairB));
    yield pairA;
  } finally {
    for (const loc of owned) loc.release();
  }
}
