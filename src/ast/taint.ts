export type Taint = "safe" | "unknown" | "tainted";

export const TAINTS: readonly Taint[] = ["safe", "unknown", "tainted"];

export const DEFAULT_TAINT: Taint = "unknown";

// Tainted absorbs everything, unknown absorbs safe.
export function combineTaint(a: Taint, b: Taint): Taint {
  if (a === "tainted" || b === "tainted") return "tainted";
  if (a === "unknown" || b === "unknown") return "unknown";
  return "safe";
}

export function combineTaints(taints: Iterable<Taint>): Taint {
  let out: Taint = "safe";
  for (const t of taints) out = combineTaint(out, t);
  return out;
}
