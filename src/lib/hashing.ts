import { createHash } from "node:crypto";
import fs from "node:fs";

export function sha256HexBytes(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

export function sha256HexUtf8(text: string): string {
  return createHash("sha256").update(Buffer.from(text, "utf8")).digest("hex");
}

export function sha256HexFile(filePath: string): string {
  return sha256HexBytes(fs.readFileSync(filePath));
}

export function canonicalJson(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (Array.isArray(value)) {
    return "[" + value.map((v) => canonicalJson(v)).join(",") + "]";
  }
  if (typeof value === "object") {
    const obj = value as Record<string, unknown>;
    const keys = Object.keys(obj).sort();
    const parts = keys.map((k) => {
      return JSON.stringify(k) + ":" + canonicalJson(obj[k]);
    });
    return "{" + parts.join(",") + "}";
  }
  return JSON.stringify(value);
}
