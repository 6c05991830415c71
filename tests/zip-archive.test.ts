import fs from "node:fs";
import path from "node:path";
import AdmZip from "adm-zip";
import { afterEach, describe, expect, test } from "vitest";
import { analyzeArchive, classifyZipEntry, extractionTarget, isSuspicious } from "../src/analyzers/archive.js";
import type { ScanItem } from "../src/analyzers/types.js";
import { ScanLocation } from "../src/lib/location.js";
import { DEFAULT_SETTINGS } from "../src/lib/settings.js";
import { collect, makeContext, makeTmpDir, patchBytes, treeOf } from "./helpers.js";

describe("suspicious entry classification", () => {
  test("absolute paths are flagged before parent references", () => {
    const finding = isSuspicious("/../etc/passwd", "pkg.zip", DEFAULT_SETTINGS);
    expect(finding?.extra).toEqual({ entry_type: "absolute_path", entry_path: "/../etc/passwd" });
    expect(finding?.signature).toBe("suspicious_archive_entry#absolute_path#/../etc/passwd#pkg.zip");
    expect(finding?.score).toBe(50);
  });

  test("any parent component is a parent reference", () => {
    expect(isSuspicious("a/../../b", "pkg.zip", DEFAULT_SETTINGS)?.extra.entry_type).toBe("parent_reference");
    expect(isSuspicious("a\\..\\b", "pkg.zip", DEFAULT_SETTINGS)?.extra.entry_path).toBe("a/../b");
    expect(isSuspicious("C:\\Windows\\system.ini", "pkg.zip", DEFAULT_SETTINGS)?.extra.entry_type).toBe("absolute_path");
  });

  test("dots inside names are fine", () => {
    expect(isSuspicious("a/..b/c..", "pkg.zip", DEFAULT_SETTINGS)).toBeNull();
    expect(isSuspicious("./setup.py", "pkg.zip", DEFAULT_SETTINGS)).toBeNull();
  });

  test("size checks apply only when a limit is set", () => {
    const entry = { name: "big.bin", size: 10, isDirectory: false };
    expect(classifyZipEntry(entry, "pkg.zip", null, DEFAULT_SETTINGS)).toEqual({ action: "extract", directory: false });
    expect(classifyZipEntry({ ...entry, size: 5 }, "pkg.zip", 5, DEFAULT_SETTINGS)).toEqual({ action: "extract", directory: false });
    const verdict = classifyZipEntry(entry, "pkg.zip", 5, DEFAULT_SETTINGS);
    expect(verdict.action === "reject" ? [verdict.finding.score, verdict.finding.extra] : null).toEqual([
      10,
      { archive_path: "big.bin", reason: "file_size_exceeded", size: 10, limit: 5 }
    ]);
  });

  test("extraction targets stay under the root", () => {
    expect(extractionTarget("/tmp/x", "a/b.txt")).toBe(path.resolve("/tmp/x/a/b.txt"));
    expect(extractionTarget("/tmp/x", "../y")).toBeNull();
    expect(extractionTarget("/tmp/x", "..")).toBeNull();
  });

  test("names that merely start with two dots stay inside the root", () => {
    expect(extractionTarget("/tmp/x", "..hidden")).toBe(path.resolve("/tmp/x/..hidden"));
    expect(extractionTarget("/tmp/x", "..foo/x")).toBe(path.resolve("/tmp/x/..foo/x"));
  });
});

describe("zip archive analyzer", () => {
  const tmpDirs: string[] = [];

  afterEach(() => {
    for (const dir of tmpDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeZip(dir: string, name: string, build: (zip: AdmZip) => void, patches: Array<[string, string]> = []): string {
    const zip = new AdmZip();
    build(zip);
    let bytes = zip.toBuffer();
    for (const [from, to] of patches) bytes = patchBytes(bytes, from, to);
    const file = path.join(dir, name);
    fs.writeFileSync(file, bytes);
    return file;
  }

  test("a parent-reference entry is reported and nothing is extracted", async () => {
    const dir = makeTmpDir(tmpDirs);
    const file = writeZip(dir, "evil.zip", (zip) => zip.addFile("zz/zz/etc/passwd", Buffer.from("root:x:0:0")), [
      ["zz/zz/etc/passwd", "../../etc/passwd"]
    ]);
    const location = await ScanLocation.create(file);
    const ctx = makeContext(makeTmpDir(tmpDirs));

    const { findings, locations } = await collect(analyzeArchive(location, ctx));
    expect(findings).toHaveLength(1);
    expect(findings[0].extra).toEqual({ entry_type: "parent_reference", entry_path: "../../etc/passwd" });
    expect(findings[0].location).toBe(location.path);
    expect(locations).toHaveLength(1);
    expect(treeOf(locations[0].path)).toEqual([]);

    locations[0].release();
    location.release();
  });

  test("an absolute entry is reported and safe entries are extracted", async () => {
    const dir = makeTmpDir(tmpDirs);
    const file = writeZip(
      dir,
      "mixed.zip",
      (zip) => {
        zip.addFile("xetc/passwd", Buffer.from("root"));
        zip.addFile("pkg/setup.py", Buffer.from("print('hi')\n"));
      },
      [["xetc/passwd", "/etc/passwd"]]
    );
    const location = await ScanLocation.create(file);
    const { findings, locations } = await collect(analyzeArchive(location, makeContext(makeTmpDir(tmpDirs))));

    expect(findings.map((f) => f.signature)).toEqual([`suspicious_archive_entry#absolute_path#/etc/passwd#${location.path}`]);
    const extracted = locations[0].path;
    expect(treeOf(extracted)).toEqual(["pkg/", "pkg/setup.py"]);
    expect(fs.readFileSync(path.join(extracted, "pkg/setup.py"), "utf8")).toBe("print('hi')\n");

    locations[0].release();
    location.release();
    expect(fs.existsSync(extracted)).toBe(false);
  });

  test("entries named with leading dots are extracted", async () => {
    const dir = makeTmpDir(tmpDirs);
    const file = writeZip(dir, "dots.zip", (zip) => {
      zip.addFile("..hidden", Buffer.from("h"));
      zip.addFile("ok.txt", Buffer.from("ok"));
    });
    const location = await ScanLocation.create(file);
    const { findings, locations } = await collect(analyzeArchive(location, makeContext(makeTmpDir(tmpDirs))));
    expect(findings).toEqual([]);
    expect(treeOf(locations[0].path).sort()).toEqual(["..hidden", "ok.txt"]);
    locations[0].release();
    location.release();
  });

  test("an entry that cannot be written does not hide later anomalies", async () => {
    const dir = makeTmpDir(tmpDirs);
    const file = writeZip(
      dir,
      "clash.zip",
      (zip) => {
        zip.addFile("a", Buffer.from("file"));
        zip.addFile("a/b", Buffer.from("under a file"));
        zip.addFile("zz/zz/evil", Buffer.from("x"));
        zip.addFile("c.txt", Buffer.from("c"));
      },
      [["zz/zz/evil", "../../evil"]]
    );
    const location = await ScanLocation.create(file);
    const { findings, locations } = await collect(analyzeArchive(location, makeContext(makeTmpDir(tmpDirs))));

    expect(findings.map((f) => f.signature)).toEqual([
      `archive_anomaly#extract_error#${location.path}#a/b`,
      `suspicious_archive_entry#parent_reference#../../evil#${location.path}`
    ]);
    expect(findings[0].extra.reason).toBe("extract_error");
    expect(findings[0].extra.archive_path).toBe("a/b");
    expect(findings[0].score).toBe(10);
    expect(treeOf(locations[0].path)).toEqual(["a", "c.txt"]);
    locations[0].release();
    location.release();
  });

  test("the child location comes before any finding", async () => {
    const dir = makeTmpDir(tmpDirs);
    const file = writeZip(dir, "big.zip", (zip) => zip.addFile("data.bin", Buffer.alloc(10, 1)));
    const location = await ScanLocation.create(file);
    const items: ScanItem[] = [];
    for await (const item of analyzeArchive(location, makeContext(makeTmpDir(tmpDirs)), 5)) items.push(item);

    expect(items).toHaveLength(2);
    const [child, finding] = items;
    expect(child).toBeInstanceOf(ScanLocation);
    if (!(child instanceof ScanLocation) || finding instanceof ScanLocation) return;
    expect(child.cleanup).toBe(true);
    expect(child.isDirectory).toBe(true);
    expect(child.parent).toBe(location);
    expect(finding.signature).toBe(`archive_anomaly#size#${location.path}#data.bin`);
    expect(finding.score).toBe(10);
    expect(treeOf(child.path)).toEqual([]);

    child.release();
    location.release();
  });

  test("the configured size limit is used when none is passed", async () => {
    const dir = makeTmpDir(tmpDirs);
    const file = writeZip(dir, "big.zip", (zip) => zip.addFile("data.bin", Buffer.alloc(10, 1)));
    const location = await ScanLocation.create(file);
    const { findings, locations } = await collect(analyzeArchive(location, makeContext(makeTmpDir(tmpDirs), { max_archive_size: 8 })));
    expect(findings.map((f) => f.extra.limit)).toEqual([8]);
    for (const loc of locations) loc.release();
    location.release();
  });

  test("a corrupt zip becomes a single read-error finding", async () => {
    const dir = makeTmpDir(tmpDirs);
    const file = path.join(dir, "broken.zip");
    fs.writeFileSync(file, Buffer.concat([Buffer.from([0x50, 0x4b, 0x03, 0x04]), Buffer.alloc(60, 0x41)]));
    const location = await ScanLocation.create(file);
    expect(location.metadata.mime).toBe("application/zip");

    const { findings, locations } = await collect(analyzeArchive(location, makeContext(makeTmpDir(tmpDirs))));
    expect(locations).toHaveLength(1);
    expect(findings).toHaveLength(1);
    const [finding] = findings;
    expect(finding.signature).toBe(`archive_anomaly#read_error#${location.path}`);
    expect(finding.message).toBe("Could not open the archive for analysis");
    expect(finding.score).toBe(10);
    expect(finding.extra.reason).toBe("archive_read_error");
    expect(finding.extra.mime).toBe("application/zip");
    expect(typeof finding.extra.exc_type).toBe("string");
    expect(typeof finding.extra.exc_message).toBe("string");

    locations[0].release();
    location.release();
  });

  test("re-running over the same archive yields the same signatures", async () => {
    const dir = makeTmpDir(tmpDirs);
    const file = writeZip(
      dir,
      "evil.zip",
      (zip) => {
        zip.addFile("zz/zz/etc/passwd", Buffer.from("x"));
        zip.addFile("big.bin", Buffer.alloc(100, 2));
      },
      [["zz/zz/etc/passwd", "../../etc/passwd"]]
    );
    const run = async () => {
      const location = await ScanLocation.create(file);
      const { findings, locations } = await collect(analyzeArchive(location, makeContext(makeTmpDir(tmpDirs)), 50));
      for (const loc of locations) loc.release();
      location.release();
      return findings.map((f) => f.signature);
    };
    const first = await run();
    expect(first).toHaveLength(2);
    expect(await run()).toEqual(first);
  });

  test("non-archives and directories are ignored", async () => {
    const dir = makeTmpDir(tmpDirs);
    const file = path.join(dir, "plain.txt");
    fs.writeFileSync(file, "hello");
    const ctx = makeContext(makeTmpDir(tmpDirs));
    expect(await collect(analyzeArchive(await ScanLocation.create(file), ctx))).toEqual({ findings: [], locations: [] });
    expect(await collect(analyzeArchive(await ScanLocation.create(dir), ctx))).toEqual({ findings: [], locations: [] });
  });

  test("nesting beyond the maximum depth is reported instead of unpacked", async () => {
    const dir = makeTmpDir(tmpDirs);
    const file = writeZip(dir, "deep.zip", (zip) => zip.addFile("a.txt", Buffer.from("a")));
    const tmpRoot = makeTmpDir(tmpDirs);
    const { findings, locations } = await collect(analyzeArchive(await ScanLocation.create(file), makeContext(tmpRoot, { max_depth: 0 })));
    expect(locations).toEqual([]);
    expect(findings.map((f) => [f.signature, f.extra.reason])).toEqual([[`archive_anomaly#max_depth#${path.resolve(file)}`, "max_depth_exceeded"]]);
    expect(fs.readdirSync(tmpRoot)).toEqual([]);
  });
});
