import fs from "node:fs";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { detectContentType, DIRECTORY_MIME } from "./contentType.js";

export interface LocationMetadata {
  mime: string;
  depth: number;
  [key: string]: unknown;
}

export type ChildOptions = {
  cleanup?: boolean;
  metadata?: Partial<LocationMetadata>;
};

/**
 * A unit of analysis: a filesystem path plus metadata.
 *
 * Locations created with `cleanup: true` own their directory. Ownership is
 * reference counted: a location holds one reference for its own processing and
 * one for every child created from it, so an extraction directory outlives the
 * files scanned inside it and is removed exactly once, after the last of them
 * calls `release()`.
 */
export class ScanLocation {
  readonly id: string = uuidv4();
  readonly path: string;
  readonly metadata: LocationMetadata;
  readonly parent: ScanLocation | null;
  readonly cleanup: boolean;
  /** The other side of a differential scan, when this location is one half of a pair. */
  pair: ScanLocation | null = null;

  private refs = 1;
  private removed = false;
  private selfReleased = false;

  private constructor(args: { path: string; metadata: LocationMetadata; parent: ScanLocation | null; cleanup: boolean }) {
    this.path = args.path;
    this.metadata = args.metadata;
    this.parent = args.parent;
    this.cleanup = args.cleanup;
  }

  static async create(locationPath: string, options: ChildOptions = {}): Promise<ScanLocation> {
    const resolved = path.resolve(locationPath);
    const mime = options.metadata?.mime ?? (await detectContentType(resolved));
    return new ScanLocation({
      path: resolved,
      metadata: { depth: 0, ...options.metadata, mime },
      parent: null,
      cleanup: options.cleanup ?? false
    });
  }

  async createChild(newPath: string, options: ChildOptions = {}): Promise<ScanLocation> {
    if (this.refs <= 0) {
      throw new Error(`Cannot derive a location from released location ${this.path}`);
    }
    const resolved = path.resolve(newPath);
    // Held while the content type is detected, so the parent cannot go away meanwhile.
    this.refs += 1;
    let mime: string;
    try {
      mime = options.metadata?.mime ?? (await detectContentType(resolved));
    } catch (e) {
      this.dropRef();
      throw e;
    }
    const { mime: _parentMime, ...inherited } = this.metadata;
    return new ScanLocation({
      path: resolved,
      metadata: {
        ...inherited,
        ...options.metadata,
        depth: this.metadata.depth + 1,
        mime
      },
      parent: this,
      cleanup: options.cleanup ?? false
    });
  }

  get isDirectory(): boolean {
    return this.metadata.mime === DIRECTORY_MIME;
  }

  get isReleased(): boolean {
    return this.refs <= 0;
  }

  /** Number of archive extractions between the scan root and this location. */
  get archiveDepth(): number {
    let depth = 0;
    for (let loc: ScanLocation | null = this; loc !== null; loc = loc.parent) {
      if (loc.cleanup) depth += 1;
    }
    return depth;
  }

  /** Ends this location's own processing; a second call is a no-op. */
  release(): void {
    if (this.selfReleased) return;
    this.selfReleased = true;
    this.dropRef();
  }

  private dropRef(): void {
    this.refs -= 1;
    if (this.refs > 0) return;

    if (this.cleanup && !this.removed) {
      this.removed = true;
      fs.rmSync(this.path, { recursive: true, force: true });
    }
    this.parent?.dropRef();
  }
}
