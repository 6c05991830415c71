import fs from "node:fs";
import path from "node:path";
import type { Analyzer } from "./types.js";

/** Regular files under `root`, depth first in name order. Symlinks are not followed. */
export function listFiles(root: string): string[] {
  const out: string[] = [];
  const walk = (dir: string) => {
    const entries = fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) walk(full);
      else if (entry.isFile()) out.push(full);
    }
  };
  walk(root);
  return out;
}

export const directoryAnalyzer: Analyzer = {
  id: "directory",
  description: "Schedules every regular file of a directory for analysis",
  async *analyze(location, ctx) {
    if (!location.isDirectory) return;
    const files = listFiles(location.path);
    ctx.logger.debug(`Walking directory path=${location.path} files=${files.length}`);
    for (const file of files) yield await location.createChild(file);
  }
};
