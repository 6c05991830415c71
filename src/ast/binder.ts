import {
  ArgumentsNode,
  CallNode,
  DictionaryNode,
  StringNode,
  type NodeValue
} from "./nodes.js";

export type ParameterKind = "positional_only" | "positional_or_keyword" | "var_positional" | "keyword_only" | "var_keyword";

export type Parameter = {
  name: string;
  kind: ParameterKind;
  /** Present when the parameter may be omitted. */
  default?: { value: NodeValue };
};

/**
 * Declarative parameter shape used by rules: `positional` parameters are
 * required and may be passed either way, `keywords` carry defaults.
 */
export type CallShape = {
  positionalOnly?: readonly string[];
  positional?: readonly string[];
  keywords?: Readonly<Record<string, NodeValue>>;
  varPositional?: string;
  varKeyword?: string;
};

export type BoundValue = NodeValue | NodeValue[] | Map<string, NodeValue>;

export type BindResult = { ok: true; bound: BoundArguments } | { ok: false; reason: string };

const KIND_ORDER: Record<ParameterKind, number> = {
  positional_only: 0,
  positional_or_keyword: 1,
  var_positional: 2,
  keyword_only: 3,
  var_keyword: 4
};

export class BoundArguments {
  constructor(
    private readonly values: ReadonlyMap<string, BoundValue>,
    private readonly explicit: ReadonlySet<string>
  ) {}

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): BoundValue | undefined {
    return this.values.get(name);
  }

  /** True when the call site passed the parameter instead of relying on its default. */
  supplied(name: string): boolean {
    return this.explicit.has(name);
  }

  get names(): string[] {
    return [...this.values.keys()];
  }
}

export class Signature {
  readonly parameters: readonly Parameter[];

  constructor(parameters: Parameter[]) {
    const seen = new Set<string>();
    let lastOrder = -1;
    let sawDefault = false;
    for (const p of parameters) {
      if (seen.has(p.name)) throw new Error(`Duplicate parameter name: ${p.name}`);
      seen.add(p.name);

      const order = KIND_ORDER[p.kind];
      if (order < lastOrder) throw new Error(`Parameter ${p.name} (${p.kind}) is out of order`);
      if ((p.kind === "var_positional" || p.kind === "var_keyword") && order === lastOrder) {
        throw new Error(`Only one ${p.kind} parameter is allowed`);
      }
      lastOrder = order;

      if (p.kind === "positional_only" || p.kind === "positional_or_keyword") {
        if (p.default) sawDefault = true;
        else if (sawDefault) throw new Error(`Non-default parameter ${p.name} follows a default parameter`);
      }
    }
    this.parameters = [...parameters];
  }

  static fromShape(shape: CallShape): Signature {
    const params: Parameter[] = [];
    for (const name of shape.positionalOnly ?? []) params.push({ name, kind: "positional_only" });
    for (const name of shape.positional ?? []) params.push({ name, kind: "positional_or_keyword" });
    for (const [name, value] of Object.entries(shape.keywords ?? {})) {
      params.push({ name, kind: "positional_or_keyword", default: { value } });
    }
    if (shape.varPositional) params.push({ name: shape.varPositional, kind: "var_positional" });
    if (shape.varKeyword) params.push({ name: shape.varKeyword, kind: "var_keyword" });
    return new Signature(params);
  }

  bind(args: readonly NodeValue[], kwargs: ReadonlyMap<string, NodeValue>): BindResult {
    const values = new Map<string, BoundValue>();
    const explicit = new Set<string>();
    const positional = this.parameters.filter((p) => p.kind === "positional_only" || p.kind === "positional_or_keyword");
    const varPositional = this.parameters.find((p) => p.kind === "var_positional");
    const varKeyword = this.parameters.find((p) => p.kind === "var_keyword");

    const extraPositional: NodeValue[] = [];
    args.forEach((value, idx) => {
      const param = positional[idx];
      if (param) {
        values.set(param.name, value);
        explicit.add(param.name);
      } else {
        extraPositional.push(value);
      }
    });
    if (extraPositional.length > 0 && !varPositional) {
      return { ok: false, reason: `too many positional arguments: expected at most ${positional.length}, got ${args.length}` };
    }

    const extraKeywords = new Map<string, NodeValue>();
    for (const [name, value] of kwargs) {
      const param = this.parameters.find((p) => p.name === name);
      const bindable = param && (param.kind === "positional_or_keyword" || param.kind === "keyword_only");
      if (!param || !bindable) {
        // Positional-only names passed by keyword land in **kwargs, like unknown names.
        if (!varKeyword) {
          return param?.kind === "positional_only"
            ? { ok: false, reason: `'${name}' is positional only but was passed as a keyword` }
            : { ok: false, reason: `unexpected keyword argument '${name}'` };
        }
        extraKeywords.set(name, value);
        continue;
      }
      if (explicit.has(name)) {
        return { ok: false, reason: `multiple values for argument '${name}'` };
      }
      values.set(name, value);
      explicit.add(name);
    }

    for (const p of this.parameters) {
      if (p.kind === "var_positional" || p.kind === "var_keyword" || values.has(p.name)) continue;
      if (!p.default) {
        return { ok: false, reason: `missing required argument '${p.name}'` };
      }
      values.set(p.name, p.default.value);
    }

    if (varPositional) values.set(varPositional.name, extraPositional);
    if (varKeyword) values.set(varKeyword.name, extraKeywords);

    return { ok: true, bound: new BoundArguments(values, explicit) };
  }
}

/**
 * Flattens a call's keyword arguments into a plain mapping. A Dictionary passed
 * as `**kwargs` only materializes when every key is a string literal.
 */
export function materializeKeywords(call: CallNode): Map<string, NodeValue> | null {
  const kwargs = call.kwargs;
  if (!(kwargs instanceof DictionaryNode)) return new Map(kwargs);

  const out = new Map<string, NodeValue>();
  for (const [key, value] of kwargs.entries()) {
    const name = key instanceof StringNode ? key.value : key;
    if (typeof name !== "string") return null;
    out.set(name, value);
  }
  return out;
}

export function bindCall(call: CallNode, signature: Signature): BindResult {
  const kwargs = materializeKeywords(call);
  if (kwargs === null) {
    return { ok: false, reason: "keyword arguments contain a non-string key" };
  }
  return signature.bind(call.args, kwargs);
}

export function applySignature(call: CallNode, shape: CallShape): BindResult {
  return bindCall(call, Signature.fromShape(shape));
}

export function signatureFromArguments(node: ArgumentsNode): Signature {
  const params: Parameter[] = [];
  const offset = node.args.length - node.defaults.length;
  node.args.forEach((name, idx) => {
    params.push(
      idx >= offset
        ? { name, kind: "positional_or_keyword", default: { value: node.defaults[idx - offset] } }
        : { name, kind: "positional_or_keyword" }
    );
  });
  if (node.vararg !== null) params.push({ name: node.vararg, kind: "var_positional" });
  for (const name of node.kwonlyargs) {
    const fallback = node.kwDefaults.get(name);
    params.push(
      node.kwDefaults.has(name) && fallback !== undefined
        ? { name, kind: "keyword_only", default: { value: fallback } }
        : { name, kind: "keyword_only" }
    );
  }
  if (node.kwarg !== null) params.push({ name: node.kwarg, kind: "var_keyword" });
  return new Signature(params);
}
