import { archiveAnalyzer } from "../analyzers/archive.js";
import { directoryAnalyzer } from "../analyzers/directory.js";
import { createTreeAnalyzer } from "../analyzers/tree.js";
import type { Analyzer, AnalyzerContext, ScanItem } from "../analyzers/types.js";
import { JsonDumpParser, type SourceParser } from "../ast/parser.js";
import { buildSignature, createFinding, errorDetails, type Finding } from "./finding.js";
import { ScanLocation } from "./location.js";
import { getScoreOrDefault } from "./settings.js";

export function createDefaultAnalyzers(parser: SourceParser = new JsonDumpParser()): Analyzer[] {
  return [directoryAnalyzer, archiveAnalyzer, createTreeAnalyzer(parser)];
}

export class Pipeline {
  constructor(
    private readonly analyzers: readonly Analyzer[],
    private readonly ctx: AnalyzerContext
  ) {}

  /**
   * Everything the registered analyzers produce for one location. A failing
   * analyzer ends with an `analyzer_error` finding; the others still run.
   */
  async *analyze(location: ScanLocation): AsyncGenerator<ScanItem> {
    for (const analyzer of this.analyzers) {
      try {
        yield* analyzer.analyze(location, this.ctx);
      } catch (e) {
        const details = errorDetails(e);
        this.ctx.logger.warn(`Analyzer failed analyzer=${analyzer.id} location=${location.path} error=${details.exc_message}`);
        yield createFinding({
          type: "AnalyzerError",
          location: location.path,
          message: `Analyzer ${analyzer.id} failed`,
          signature: buildSignature("analyzer_error", analyzer.id, location.path),
          score: getScoreOrDefault(this.ctx.settings, "analyzer-error", 0),
          extra: { analyzer: analyzer.id, ...details }
        });
      }
    }
  }

  /**
   * Scans `root` and every location discovered under it, breadth first.
   * Takes ownership of `root`. Findings are deduplicated by signature.
   * Stopping the iteration early still releases every pending location.
   */
  async *run(root: ScanLocation): AsyncGenerator<Finding> {
    const queue: ScanLocation[] = [root];
    const seen = new Set<string>();
    try {
      for (let location = queue.shift(); location !== undefined; location = queue.shift()) {
        try {
          for await (const item of this.analyze(location)) {
            if (item instanceof ScanLocation) {
              queue.push(item);
              continue;
            }
            if (seen.has(item.signature)) continue;
            seen.add(item.signature);
            yield item;
          }
        } finally {
          location.release();
        }
      }
    } finally {
      for (const pending of queue.splice(0)) pending.release();
    }
  }
}
