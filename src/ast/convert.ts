import {
  ArgumentsNode,
  AttributeNode,
  BinaryOpNode,
  CallNode,
  CompareNode,
  DictionaryNode,
  FunctionDefNode,
  ImportNode,
  NumberNode,
  PrintNode,
  StringNode,
  VariableNode,
  isTreeNode,
  type NodeRecord,
  type NodeValue
} from "./nodes.js";

/**
 * Converts the generic tree handed over by a parser front end (objects tagged
 * with `_type`, in the shape of a Python AST dump) into tree nodes. Objects
 * with an unknown `_type` are kept as raw records with converted children.
 */
export function convertTree(raw: unknown): NodeValue {
  if (raw === null || raw === undefined) return null;
  // Bare scalars are metadata (lineno, col_offset, level); literals arrive as Constant/Num/Str.
  if (typeof raw === "string" || typeof raw === "boolean" || typeof raw === "number") return raw;
  if (Array.isArray(raw)) return raw.map(convertTree);
  if (typeof raw !== "object") return null;

  const record = toRecord(raw);
  const type = record._type;
  if (typeof type === "string") {
    const node = convertTyped(type, record);
    if (node !== undefined) {
      const lineNo = record.lineno;
      if (isTreeNode(node) && typeof lineNo === "number") node.lineNo = lineNo;
      return node;
    }
  }

  const out: NodeRecord = {};
  for (const [key, value] of Object.entries(record)) out[key] = convertTree(value);
  return out;
}

function convertTyped(type: string, r: Record<string, unknown>): NodeValue | undefined {
  switch (type) {
    case "Num":
      return typeof r.n === "number" ? new NumberNode({ value: r.n }) : undefined;
    case "Str":
      return typeof r.s === "string" ? new StringNode({ value: r.s }) : undefined;
    case "Constant":
      if (typeof r.value === "number") return new NumberNode({ value: r.value });
      if (typeof r.value === "string") return new StringNode({ value: r.value });
      if (typeof r.value === "boolean" || r.value === null) return r.value;
      return undefined;
    case "Dict":
      return new DictionaryNode({ keys: list(r.keys), values: list(r.values) });
    case "Name":
      return typeof r.id === "string" ? new VariableNode({ name: r.id, varType: "name" }) : undefined;
    case "Assign": {
      const targets = Array.isArray(r.targets) ? r.targets.map(toRecord) : [];
      const target = targets[0];
      if (targets.length !== 1 || target?._type !== "Name" || typeof target.id !== "string") return undefined;
      return new VariableNode({ name: target.id, value: convertTree(r.value), varType: "assign" });
    }
    case "Attribute":
      if (typeof r.attr !== "string") return undefined;
      return new AttributeNode({ source: convertTree(r.value), attr: r.attr, action: typeName(r.ctx)?.toLowerCase() ?? "load" });
    case "Compare":
      return new CompareNode({
        left: convertTree(r.left),
        ops: (Array.isArray(r.ops) ? r.ops : []).map((op) => typeName(op) ?? "unknown"),
        comparators: list(r.comparators)
      });
    case "FunctionDef":
      if (typeof r.name !== "string") return undefined;
      return new FunctionDefNode({
        name: r.name,
        parameters: convertTree(r.args),
        body: list(r.body),
        decorators: list(r.decorator_list),
        returns: convertTree(r.returns)
      });
    case "arguments":
      return convertArguments(r);
    case "Call":
      return convertCall(r);
    case "Import":
      return convertImport(r, "import");
    case "ImportFrom":
      return convertImport(r, "from");
    case "BinOp":
      return new BinaryOpNode({ op: typeName(r.op) ?? "unknown", left: convertTree(r.left), right: convertTree(r.right) });
    case "Print":
      return new PrintNode({ values: list(r.values), dest: convertTree(r.dest) });
    default:
      return undefined;
  }
}

function convertCall(r: Record<string, unknown>): CallNode {
  const kwargs = new Map<string, NodeValue>();
  const spreads: DictionaryNode[] = [];
  for (const keyword of Array.isArray(r.keywords) ? r.keywords.map(toRecord) : []) {
    const value = convertTree(keyword.value);
    if (typeof keyword.arg === "string") kwargs.set(keyword.arg, value);
    else if (value instanceof DictionaryNode) spreads.push(value);
  }
  // `f(**{"key_size": 1024})` keeps the dictionary; rewrites may still fold its keys.
  if (spreads.length === 1 && kwargs.size === 0) {
    return new CallNode({ func: convertTree(r.func), args: list(r.args), kwargs: spreads[0] });
  }
  for (const spread of spreads) {
    const entries = literalEntries(spread);
    if (entries === null) continue;
    for (const [key, value] of entries) kwargs.set(key, value);
  }
  return new CallNode({ func: convertTree(r.func), args: list(r.args), kwargs });
}

function literalEntries(dict: DictionaryNode): Array<[string, NodeValue]> | null {
  const out: Array<[string, NodeValue]> = [];
  for (const [key, value] of dict.entries()) {
    if (key instanceof StringNode) out.push([key.value, value]);
    else if (typeof key === "string") out.push([key, value]);
    else return null;
  }
  return out;
}

function convertArguments(r: Record<string, unknown>): ArgumentsNode {
  const kwonly = argNames(r.kwonlyargs);
  const kwDefaults = new Map<string, NodeValue>();
  // kw_defaults aligns with kwonlyargs, a JSON null marks "no default"
  const rawKwDefaults = Array.isArray(r.kw_defaults) ? r.kw_defaults : [];
  kwonly.forEach((name, idx) => {
    const raw = rawKwDefaults[idx];
    if (raw !== null && raw !== undefined) kwDefaults.set(name, convertTree(raw));
  });
  return new ArgumentsNode({
    args: argNames(r.args),
    vararg: argName(r.vararg),
    kwonlyargs: kwonly,
    kwarg: argName(r.kwarg),
    defaults: list(r.defaults),
    kwDefaults
  });
}

function convertImport(r: Record<string, unknown>, form: "import" | "from"): NodeValue | undefined {
  const names = Array.isArray(r.names) ? r.names.map(toRecord) : [];
  const level = typeof r.level === "number" ? r.level : 0;
  const base = form === "from" ? ".".repeat(level) + (typeof r.module === "string" ? r.module : "") : "";
  const lineNo = typeof r.lineno === "number" ? r.lineno : null;

  const nodes: ImportNode[] = [];
  for (const alias of names) {
    if (typeof alias.name !== "string") continue;
    const asname = typeof alias.asname === "string" ? alias.asname : null;
    if (form === "import") {
      nodes.push(new ImportNode({ module: alias.name, alias: asname ?? alias.name, form, lineNo }));
    } else {
      const module = base.endsWith(".") || base === "" ? `${base}${alias.name}` : `${base}.${alias.name}`;
      nodes.push(new ImportNode({ module, alias: asname ?? alias.name, form, lineNo }));
    }
  }
  if (nodes.length === 0) return undefined;
  if (nodes.length === 1) return nodes[0];
  return nodes;
}

function list(value: unknown): NodeValue[] {
  return Array.isArray(value) ? value.map(convertTree) : [];
}

function argName(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (value && typeof value === "object") {
    const arg = toRecord(value).arg;
    if (typeof arg === "string") return arg;
  }
  return null;
}

function argNames(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const out: string[] = [];
  for (const item of value) {
    const name = argName(item);
    if (name !== null) out.push(name);
  }
  return out;
}

function typeName(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (value && typeof value === "object") {
    const type = toRecord(value)._type;
    if (typeof type === "string") return type;
  }
  return null;
}

function toRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) return Object.fromEntries(Object.entries(value));
  return {};
}
