import { convertTree } from "../ast/convert.js";
import { acceptsFile, type ParsedSource, type SourceParser } from "../ast/parser.js";
import { createCryptoKeyRule } from "../ast/rules/cryptoKeys.js";
import { foldStrings } from "../ast/rules/foldStrings.js";
import { createImportResolver } from "../ast/rules/resolveImports.js";
import { rewriteToFixedPoint, TreeRoot, visitTree } from "../ast/visitor.js";
import { buildSignature, createFinding, errorDetails } from "../lib/finding.js";
import { getScoreOrDefault } from "../lib/settings.js";
import type { Analyzer } from "./types.js";

/**
 * Parses a source file, rewrites the tree until it stops changing (import
 * resolution, constant string folding), then runs the detection rules once.
 */
export function createTreeAnalyzer(parser: SourceParser): Analyzer {
  return {
    id: "tree",
    description: "Detects dangerous calls in parsed source trees",
    async *analyze(location, ctx) {
      if (location.isDirectory || !acceptsFile(parser, location.path)) return;

      const logger = ctx.logger.child("tree");
      let parsed: ParsedSource;
      try {
        parsed = await parser.parse(location.path);
      } catch (e) {
        yield createFinding({
          type: "ASTParseError",
          location: location.path,
          message: "Unable to parse the source code",
          signature: buildSignature("ast_parse_error", location.path),
          score: getScoreOrDefault(ctx.settings, "ast-parse-error", 0),
          extra: errorDetails(e)
        });
        return;
      }

      logger.debug(`Parsed source location=${location.path} runtime=${parsed.runtime}`);
      const root = new TreeRoot(convertTree(parsed.tree));
      const rewrite = rewriteToFixedPoint(root, [createImportResolver(), foldStrings], {
        location: location.path,
        maxPasses: ctx.settings.max_passes,
        logger
      });
      logger.debug(`Rewrite finished location=${location.path} passes=${rewrite.passes} converged=${rewrite.converged}`);
      yield* rewrite.findings;

      const detection = visitTree(root, [createCryptoKeyRule(ctx.settings)], {
        location: location.path,
        maxDepth: ctx.settings.max_tree_depth,
        logger
      });
      yield* detection.findings;
    }
  };
}
