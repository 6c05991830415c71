import type { Finding } from "../lib/finding.js";
import type { ScanLocation } from "../lib/location.js";
import type { Logger } from "../lib/logger.js";
import type { Settings } from "../lib/settings.js";

/** Analyzers yield detections and new locations to scan. */
export type ScanItem = Finding | ScanLocation;

export type AnalyzerContext = {
  settings: Settings;
  logger: Logger;
  /** Parent directory for extraction directories. */
  tmpRoot: string;
};

export interface Analyzer {
  readonly id: string;
  readonly description: string;
  /**
   * Lazily produces items for one location. A yielded ScanLocation belongs to
   * the consumer, which must `release()` it.
   */
  analyze(location: ScanLocation, ctx: AnalyzerContext): AsyncIterable<ScanItem>;
}
