import fs from "node:fs";
import { z } from "zod";

export type ParsedSource = {
  /** Generic primitive tree, handed to `convertTree`. */
  tree: unknown;
  /** Interpreter or runtime the tree was produced by. */
  runtime: string;
};

export interface SourceParser {
  /** File name suffixes this parser accepts, matched case-insensitively. */
  readonly extensions: readonly string[];
  parse(filePath: string): Promise<ParsedSource>;
}

export class SourceParseError extends Error {
  override name = "SourceParseError";
}

const AstDumpSchema = z.object({
  implementation: z.string().default("unknown"),
  ast_tree: z.unknown()
});

/**
 * Reads syntax trees that an external front end already dumped to JSON
 * (`{ "implementation": "cpython", "ast_tree": {...} }`).
 */
export class JsonDumpParser implements SourceParser {
  readonly extensions = [".ast.json"];

  async parse(filePath: string): Promise<ParsedSource> {
    const raw = await fs.promises.readFile(filePath, "utf8");
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new SourceParseError(`Invalid JSON in ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
    }

    const parsed = AstDumpSchema.safeParse(json);
    if (!parsed.success) throw new SourceParseError(`Invalid AST dump ${filePath}: ${parsed.error.message}`);
    if (parsed.data.ast_tree === undefined || parsed.data.ast_tree === null) {
      throw new SourceParseError(`AST dump ${filePath} has no ast_tree`);
    }
    return { tree: parsed.data.ast_tree, runtime: parsed.data.implementation };
  }
}

export function acceptsFile(parser: SourceParser, filePath: string): boolean {
  const lower = filePath.toLowerCase();
  return parser.extensions.some((ext) => lower.endsWith(ext.toLowerCase()));
}
