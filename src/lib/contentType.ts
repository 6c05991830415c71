import fs from "node:fs";
import { fileTypeFromFile } from "file-type";

export const DIRECTORY_MIME = "inode/directory";
export const UNKNOWN_MIME = "application/octet-stream";

/**
 * Content type of a path: `inode/directory` for directories, otherwise the
 * type file-type recognises from the file's leading bytes.
 */
export async function detectContentType(filePath: string): Promise<string> {
  const stat = await fs.promises.stat(filePath);
  if (stat.isDirectory()) return DIRECTORY_MIME;
  if (!stat.isFile() || stat.size === 0) return UNKNOWN_MIME;
  const detected = await fileTypeFromFile(filePath);
  return detected?.mime ?? UNKNOWN_MIME;
}
