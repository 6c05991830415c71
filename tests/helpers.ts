import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import tar from "tar-stream";
import type { AnalyzerContext, ScanItem } from "../src/analyzers/types.js";
import type { Finding } from "../src/lib/finding.js";
import { ScanLocation } from "../src/lib/location.js";
import { silentLogger } from "../src/lib/logger.js";
import { DEFAULT_SETTINGS, type Settings } from "../src/lib/settings.js";

export const FIXTURES = path.join(path.dirname(fileURLToPath(import.meta.url)), "fixtures");

export function makeTmpDir(tmpDirs: string[], prefix = "halo-test-"): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tmpDirs.push(dir);
  return dir;
}

export function makeContext(tmpRoot: string, settings: Partial<Settings> = {}): AnalyzerContext {
  return { settings: { ...DEFAULT_SETTINGS, ...settings }, logger: silentLogger, tmpRoot };
}

export async function collect(items: AsyncIterable<ScanItem>): Promise<{ findings: Finding[]; locations: ScanLocation[] }> {
  const findings: Finding[] = [];
  const locations: ScanLocation[] = [];
  for await (const item of items) {
    if (item instanceof ScanLocation) locations.push(item);
    else findings.push(item);
  }
  return { findings, locations };
}

type Pack = ReturnType<typeof tar.pack>;

export async function buildTar(fill: (pack: Pack) => void): Promise<Buffer> {
  const pack = tar.pack();
  fill(pack);
  pack.finalize();
  const chunks: Buffer[] = [];
  for await (const chunk of pack) {
    if (Buffer.isBuffer(chunk)) chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}

/**
 * Overwrites every occurrence of `from` with the same-length `to`. Used to
 * give zip entries names that archiving libraries refuse to write.
 */
export function patchBytes(buf: Buffer, from: string, to: string): Buffer {
  const needle = Buffer.from(from, "utf8");
  const replacement = Buffer.from(to, "utf8");
  if (needle.length !== replacement.length) throw new Error("patchBytes needs same-length strings");
  for (let idx = buf.indexOf(needle); idx !== -1; idx = buf.indexOf(needle, idx + needle.length)) {
    replacement.copy(buf, idx);
  }
  return buf;
}

export function treeOf(root: string): string[] {
  if (!fs.existsSync(root)) return [];
  const out: string[] = [];
  const walk = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name))) {
      const full = path.join(dir, entry.name);
      const rel = path.relative(root, full).split(path.sep).join("/");
      if (entry.isDirectory()) {
        out.push(`${rel}/`);
        walk(full);
      } else {
        out.push(rel);
      }
    }
  };
  walk(root);
  return out;
}
