import fs from "node:fs";
import path from "node:path";
import AdmZip from "adm-zip";
import { afterEach, describe, expect, test } from "vitest";
import { diffArchive } from "../src/analyzers/archive.js";
import { diffLocations, diffScan, type DiffItem } from "../src/lib/diff.js";
import { sha256HexFile } from "../src/lib/hashing.js";
import { ScanLocation } from "../src/lib/location.js";
import { collect, makeContext, makeTmpDir, patchBytes } from "./helpers.js";

function writeFiles(dir: string, files: Record<string, string>): void {
  for (const [name, content] of Object.entries(files)) {
    fs.mkdirSync(path.dirname(path.join(dir, name)), { recursive: true });
    fs.writeFileSync(path.join(dir, name), content);
  }
}

function summarize(item: DiffItem): string[] {
  if (item.type === "finding") return ["finding", item.finding.type];
  return ["diff", item.diff.operation, item.diff.a_ref ?? "-", item.diff.b_ref ?? "-"];
}

describe("file level differences", () => {
  const tmpDirs: string[] = [];

  afterEach(() => {
    for (const dir of tmpDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  test("directories produce added, deleted, modified and renamed files", async () => {
    const left = makeTmpDir(tmpDirs);
    const right = makeTmpDir(tmpDirs);
    writeFiles(left, { "keep.txt": "same", "mod.txt": "1", "gone.txt": "bye", "old.txt": "moved" });
    writeFiles(right, { "keep.txt": "same", "mod.txt": "2", "new.txt": "hello", "renamed.txt": "moved" });

    const a = await ScanLocation.create(left);
    const b = await ScanLocation.create(right);
    const diffs = diffLocations(a, b);
    expect(diffs.map((d) => [d.operation, d.a_ref, d.b_ref])).toEqual([
      ["D", "gone.txt", null],
      ["M", "mod.txt", "mod.txt"],
      ["A", null, "new.txt"],
      ["R", "old.txt", "renamed.txt"]
    ]);
    const modified = diffs[1];
    expect(modified.a_path).toBe(path.join(left, "mod.txt"));
    expect(modified.b_sha256).toBe(sha256HexFile(path.join(right, "mod.txt")));
    expect(modified.a_scan).toBe(a);
    expect(modified.b_scan).toBe(b);
    a.release();
    b.release();
  });

  test("nested paths are compared with forward slashes", async () => {
    const left = makeTmpDir(tmpDirs);
    const right = makeTmpDir(tmpDirs);
    writeFiles(left, { "pkg/a.py": "a" });
    writeFiles(right, { "pkg/a.py": "b" });
    expect(diffLocations(await ScanLocation.create(left), await ScanLocation.create(right)).map((d) => d.a_ref)).toEqual(["pkg/a.py"]);
  });

  test("two single files are compared with each other", async () => {
    const left = makeTmpDir(tmpDirs);
    const right = makeTmpDir(tmpDirs);
    writeFiles(left, { "a.txt": "one", "same.txt": "x" });
    writeFiles(right, { "a.txt": "two", "b.txt": "three", "same.txt": "x" });
    const loc = (dir: string, name: string) => ScanLocation.create(path.join(dir, name));

    expect(diffLocations(await loc(left, "same.txt"), await loc(right, "same.txt"))).toEqual([]);
    expect(diffLocations(await loc(left, "a.txt"), await loc(right, "a.txt")).map((d) => d.operation)).toEqual(["M"]);
    expect(diffLocations(await loc(left, "a.txt"), await loc(right, "b.txt")).map((d) => [d.operation, d.a_ref, d.b_ref])).toEqual([
      ["R", "a.txt", "b.txt"]
    ]);
  });
});

describe("differential archive scan", () => {
  const tmpDirs: string[] = [];

  afterEach(() => {
    for (const dir of tmpDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  test("identical archives on both sides produce nothing", async () => {
    const left = makeTmpDir(tmpDirs);
    const right = makeTmpDir(tmpDirs);
    const zip = new AdmZip();
    zip.addFile("pkg/setup.py", Buffer.from("print('hi')\n"));
    const bytes = zip.toBuffer();
    fs.writeFileSync(path.join(left, "pkg.zip"), bytes);
    fs.writeFileSync(path.join(right, "pkg.zip"), bytes);

    const tmpRoot = makeTmpDir(tmpDirs);
    const ctx = makeContext(tmpRoot);
    const items: DiffItem[] = [];
    for await (const item of diffScan(await ScanLocation.create(left), await ScanLocation.create(right), ctx)) items.push(item);
    expect(items).toEqual([]);

    const sha = sha256HexFile(path.join(left, "pkg.zip"));
    const unchanged = diffArchive(
      {
        operation: "M",
        a_path: path.join(left, "pkg.zip"),
        b_path: path.join(right, "pkg.zip"),
        a_ref: "pkg.zip",
        b_ref: "pkg.zip",
        a_sha256: sha,
        b_sha256: sha,
        a_scan: await ScanLocation.create(left),
        b_scan: await ScanLocation.create(right)
      },
      ctx
    );
    expect(await collect(unchanged)).toEqual({ findings: [], locations: [] });
    expect(fs.readdirSync(tmpRoot)).toEqual([]);
  });

  test("a modified archive is unpacked on both sides and diffed recursively", async () => {
    const left = makeTmpDir(tmpDirs);
    const right = makeTmpDir(tmpDirs);
    const before = new AdmZip();
    before.addFile("pkg/setup.py", Buffer.from("print('hi')\n"));
    fs.writeFileSync(path.join(left, "pkg.zip"), before.toBuffer());
    const after = new AdmZip();
    after.addFile("pkg/setup.py", Buffer.from("print('hi')\n"));
    after.addFile("pkg/new.py", Buffer.from("import os\n"));
    after.addFile("zz/zz/evil", Buffer.from("x"));
    fs.writeFileSync(path.join(right, "pkg.zip"), patchBytes(after.toBuffer(), "zz/zz/evil", "../../evil"));

    const tmpRoot = makeTmpDir(tmpDirs);
    const a = await ScanLocation.create(left);
    const b = await ScanLocation.create(right);
    const items: DiffItem[] = [];
    for await (const item of diffScan(a, b, makeContext(tmpRoot))) items.push(item);

    expect(items.map(summarize)).toEqual([
      ["diff", "M", "pkg.zip", "pkg.zip"],
      ["finding", "SuspiciousArchiveEntry"],
      ["diff", "A", "-", "pkg/new.py"]
    ]);
    const added = items[2];
    expect(added.type === "diff" ? added.diff.b_path?.startsWith(tmpRoot) : false).toBe(true);
    expect(fs.readdirSync(tmpRoot)).toEqual([]);
    a.release();
    b.release();
  });

  test("only modified or renamed files with differing content are unpacked", async () => {
    const left = makeTmpDir(tmpDirs);
    const zip = new AdmZip();
    zip.addFile("a.txt", Buffer.from("a"));
    const file = path.join(left, "pkg.zip");
    fs.writeFileSync(file, zip.toBuffer());

    const tmpRoot = makeTmpDir(tmpDirs);
    const scan = await ScanLocation.create(left);
    const added = diffArchive(
      {
        operation: "A",
        a_path: null,
        b_path: file,
        a_ref: null,
        b_ref: "pkg.zip",
        a_sha256: null,
        b_sha256: sha256HexFile(file),
        a_scan: scan,
        b_scan: scan
      },
      makeContext(tmpRoot)
    );
    expect(await collect(added)).toEqual({ findings: [], locations: [] });
    expect(fs.readdirSync(tmpRoot)).toEqual([]);
  });
});
