export type FindingValue = string | number | boolean | null | FindingValue[] | { [key: string]: FindingValue };

export type FindingExtra = { [key: string]: FindingValue };

/**
 * One detection. Findings are frozen once created; two findings describe the same
 * condition iff their signatures are equal.
 */
export interface Finding {
  readonly type: string;
  readonly location: string;
  readonly message: string;
  readonly signature: string;
  readonly score: number;
  readonly line_no: number | null;
  readonly extra: Readonly<FindingExtra>;
}

export type FindingInput = {
  type: string;
  location: string;
  signature: string;
  message?: string;
  score?: number;
  line_no?: number | null;
  extra?: FindingExtra;
};

export function createFinding(input: FindingInput): Finding {
  return Object.freeze({
    type: input.type,
    location: input.location,
    message: input.message ?? "",
    signature: input.signature,
    score: input.score ?? 0,
    line_no: input.line_no ?? null,
    extra: Object.freeze({ ...(input.extra ?? {}) })
  });
}

export function buildSignature(...parts: Array<string | number | null>): string {
  return parts.map((p) => (p === null ? "" : String(p))).join("#");
}

export function findingToJson(f: Finding): FindingExtra {
  return {
    type: f.type,
    location: f.location,
    message: f.message,
    signature: f.signature,
    score: f.score,
    line_no: f.line_no,
    extra: { ...f.extra }
  };
}

export function errorDetails(e: unknown): { exc_type: string; exc_message: string } {
  if (e instanceof Error) {
    return { exc_type: e.name || e.constructor.name, exc_message: e.message };
  }
  return { exc_type: typeof e, exc_message: String(e) };
}
