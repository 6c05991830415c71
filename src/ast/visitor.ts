import type { Finding } from "../lib/finding.js";
import { silentLogger, type Logger } from "../lib/logger.js";
import {
  BaseNode,
  isNodeRecord,
  isTreeNode,
  type NodeKind,
  type NodeOfKind,
  type NodeValue,
  type Slot
} from "./nodes.js";

/**
 * A node-visiting rule. `kinds` is the dispatch key: the engine only calls
 * `visit` for nodes whose kind is listed.
 */
export interface NodeRule<K extends NodeKind = NodeKind> {
  readonly id: string;
  readonly kinds: readonly K[];
  visit(node: NodeOfKind<K>, context: Context): Iterable<Finding> | void;
}

export function defineRule<K extends NodeKind>(rule: NodeRule<K>): NodeRule {
  return rule;
}

export type TraversalOptions = {
  /** Path of the analyzed file, carried into rule findings. */
  location: string;
  maxDepth?: number | null;
  logger?: Logger;
};

/** Holds the root of a tree so the root itself can be replaced like any other slot. */
export class TreeRoot {
  constructor(public node: NodeValue) {}

  slot(): Slot {
    return {
      label: "root",
      get: () => this.node,
      set: (value) => {
        this.node = value;
      }
    };
  }
}

/**
 * Position of one pending visit. Contexts are created by the traversal only;
 * `node` always reads whatever currently occupies the slot.
 */
export class Context {
  /** @internal */
  constructor(
    private readonly traversal: Traversal,
    private readonly slot: Slot,
    readonly parent: Context | null,
    readonly depth: number
  ) {}

  get node(): NodeValue {
    return this.slot.get();
  }

  get label(): string {
    return this.slot.label;
  }

  get location(): string {
    return this.traversal.location;
  }

  get modified(): boolean {
    return this.traversal.modified;
  }

  replace(value: NodeValue): void {
    this.slot.set(value);
    this.traversal.markModified();
    for (let ctx = this.parent; ctx !== null; ctx = ctx.parent) {
      const owner = ctx.node;
      if (owner instanceof BaseNode) owner.invalidateHash();
    }
  }

  visitChild(slot: Slot): void {
    this.traversal.enqueue(new Context(this.traversal, slot, this, this.depth + 1));
  }
}

export function childSlots(value: NodeValue): Slot[] {
  if (isTreeNode(value)) return value.children();
  if (Array.isArray(value)) {
    const list = value;
    return list.map((_, idx) => ({
      label: `[${idx}]`,
      get: () => list[idx],
      set: (next: NodeValue) => {
        list[idx] = next;
      }
    }));
  }
  if (isNodeRecord(value)) {
    const record = value;
    return Object.keys(record).map((key) => ({
      label: key,
      get: () => record[key],
      set: (next: NodeValue) => {
        record[key] = next;
      }
    }));
  }
  return [];
}

/**
 * One top-down pass over a tree. The worklist is FIFO, so nodes are visited
 * breadth first; a node replaced during the pass is not revisited, but the
 * children of its replacement are.
 */
export class Traversal {
  readonly location: string;
  private readonly queue: Context[] = [];
  private readonly dispatch = new Map<NodeKind, NodeRule[]>();
  private readonly maxDepth: number | null;
  private readonly logger: Logger;
  private dirty = false;
  private started = false;
  private visitedCount = 0;

  constructor(rules: readonly NodeRule[], options: TraversalOptions) {
    this.location = options.location;
    this.maxDepth = options.maxDepth ?? null;
    this.logger = options.logger ?? silentLogger;
    for (const rule of rules) {
      for (const kind of rule.kinds) {
        const handlers = this.dispatch.get(kind) ?? [];
        handlers.push(rule);
        this.dispatch.set(kind, handlers);
      }
    }
  }

  get modified(): boolean {
    return this.dirty;
  }

  get visited(): number {
    return this.visitedCount;
  }

  markModified(): void {
    this.dirty = true;
  }

  enqueue(context: Context): void {
    this.queue.push(context);
  }

  *run(root: TreeRoot): Generator<Finding> {
    if (this.started) throw new Error("A traversal can only run once; create a new one per pass");
    this.started = true;
    this.enqueue(new Context(this, root.slot(), null, 0));

    let depthLimitHit = false;
    for (let head = 0; head < this.queue.length; head += 1) {
      const context = this.queue[head];
      this.visitedCount += 1;

      const initial = context.node;
      if (isTreeNode(initial)) {
        for (const rule of this.dispatch.get(initial.kind) ?? []) {
          // An earlier rule may have replaced the node in this slot.
          const current = context.node;
          if (!isTreeNode(current) || !rule.kinds.includes(current.kind)) continue;
          const out = rule.visit(current, context);
          if (out) yield* out;
        }
      }

      if (this.maxDepth !== null && context.depth >= this.maxDepth) {
        if (!depthLimitHit) {
          this.logger.debug(`Tree depth limit reached location=${this.location} max_depth=${this.maxDepth}`);
          depthLimitHit = true;
        }
        continue;
      }
      for (const slot of childSlots(context.node)) context.visitChild(slot);
    }
  }
}

export function visitTree(root: TreeRoot, rules: readonly NodeRule[], options: TraversalOptions): { findings: Finding[]; modified: boolean } {
  const traversal = new Traversal(rules, options);
  const findings = [...traversal.run(root)];
  return { findings, modified: traversal.modified };
}

/**
 * Reruns rewrite passes until one leaves the tree untouched. Returns the number
 * of passes performed; stops at `maxPasses` even if the tree keeps changing.
 */
export function rewriteToFixedPoint(
  root: TreeRoot,
  rules: readonly NodeRule[],
  options: TraversalOptions & { maxPasses: number }
): { passes: number; converged: boolean; findings: Finding[] } {
  const findings: Finding[] = [];
  for (let pass = 1; pass <= options.maxPasses; pass += 1) {
    const result = visitTree(root, rules, options);
    findings.push(...result.findings);
    if (!result.modified) return { passes: pass, converged: true, findings };
  }
  options.logger?.warn(`Rewrite did not converge location=${options.location} max_passes=${options.maxPasses}`);
  return { passes: options.maxPasses, converged: false, findings };
}
