import { canonicalJson, sha256HexUtf8 } from "../lib/hashing.js";
import { combineTaint, DEFAULT_TAINT, type Taint } from "./taint.js";

export type Primitive = string | number | boolean | null;

export interface NodeRecord {
  [key: string]: NodeValue;
}

/**
 * Anything that can sit in a tree slot: a wrapped node, a literal, or a raw
 * container left over from the primitive tree the front end produced.
 */
export type NodeValue = TreeNode | Primitive | NodeValue[] | NodeRecord;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type NodeKind =
  | "Number"
  | "String"
  | "Dictionary"
  | "Variable"
  | "Attribute"
  | "Compare"
  | "FunctionDef"
  | "Call"
  | "Arguments"
  | "Import"
  | "BinaryOp"
  | "Print";

/**
 * A single child position inside a node. `set` overwrites exactly that
 * position and nothing else.
 */
export interface Slot {
  readonly label: string;
  get(): NodeValue;
  set(value: NodeValue): void;
}

export class NodeRewriteError extends Error {
  override name = "NodeRewriteError";
}

/** Longest string a constant fold may produce. */
export const MAX_FOLDED_LENGTH = 1 << 20;

function checkFoldedLength(length: number): void {
  if (length > MAX_FOLDED_LENGTH) {
    throw new NodeRewriteError(`Folded string of ${length} characters exceeds ${MAX_FOLDED_LENGTH}`);
  }
}

export abstract class BaseNode {
  abstract readonly kind: NodeKind;
  lineNo: number | null = null;
  readonly tags = new Set<string>();
  protected resolvedName: string | null = null;
  private taintClass: Taint = DEFAULT_TAINT;
  private cachedHash: string | null = null;

  get fullName(): string | null {
    return this.resolvedName;
  }

  resolveAs(name: string | null): void {
    this.resolvedName = name;
    this.invalidateHash();
  }

  /** True when the node is a literal or built only from literals. */
  get isStatic(): boolean {
    return false;
  }

  get taint(): Taint {
    return this.taintClass;
  }

  set taint(value: Taint) {
    this.taintClass = value;
  }

  addTaint(value: Taint): Taint {
    this.taintClass = combineTaint(this.taintClass, value);
    return this.taintClass;
  }

  children(): Slot[] {
    return [];
  }

  get hash(): string {
    if (this.cachedHash === null) {
      this.cachedHash = sha256HexUtf8(canonicalJson(this.toJSON()));
    }
    return this.cachedHash;
  }

  invalidateHash(): void {
    this.cachedHash = null;
  }

  protected abstract fields(): { [key: string]: JsonValue };

  toJSON(): { [key: string]: JsonValue } {
    const data: { [key: string]: JsonValue } = { ast_type: this.kind };
    if (this.fullName !== null) data.full_name = this.fullName;
    if (this.tags.size > 0) data.tags = [...this.tags].sort();
    if (this.lineNo !== null) data.line_no = this.lineNo;
    if (this.taintClass !== DEFAULT_TAINT) data.taint = this.taintClass;
    return { ...data, ...this.fields() };
  }

  protected fieldSlot(label: string, get: () => NodeValue, set: (value: NodeValue) => void): Slot {
    return {
      label,
      get,
      set: (value) => {
        set(value);
        this.invalidateHash();
      }
    };
  }

  protected listSlots(label: string, list: NodeValue[]): Slot[] {
    return list.map((_, idx) =>
      this.fieldSlot(
        `${label}[${idx}]`,
        () => list[idx],
        (value) => {
          list[idx] = value;
        }
      )
    );
  }

  protected mapSlots(label: string, map: Map<string, NodeValue>): Slot[] {
    return [...map.keys()].map((key) =>
      this.fieldSlot(
        `${label}.${key}`,
        () => map.get(key) ?? null,
        (value) => {
          map.set(key, value);
        }
      )
    );
  }
}

type Meta = { lineNo?: number | null };

function applyMeta(node: BaseNode, meta: Meta): void {
  if (meta.lineNo !== undefined) node.lineNo = meta.lineNo;
}

export class NumberNode extends BaseNode {
  readonly kind = "Number";
  readonly value: number;

  constructor(args: { value: number } & Meta) {
    super();
    this.value = args.value;
    applyMeta(this, args);
  }

  override get isStatic(): boolean {
    return true;
  }

  protected fields() {
    return { value: this.value };
  }
}

export class StringNode extends BaseNode {
  readonly kind = "String";
  readonly value: string;

  constructor(args: { value: string } & Meta) {
    super();
    this.value = args.value;
    applyMeta(this, args);
  }

  override get isStatic(): boolean {
    return true;
  }

  concat(other: NodeValue): StringNode {
    if (other instanceof StringNode) {
      checkFoldedLength(this.value.length + other.value.length);
      return new StringNode({ value: this.value + other.value, lineNo: this.lineNo });
    }
    throw new NodeRewriteError(`Can't add String and ${describeValue(other)}`);
  }

  repeat(times: NodeValue): StringNode {
    const count = times instanceof NumberNode ? times.value : times;
    if (typeof count === "number" && Number.isInteger(count)) {
      const reps = Math.max(0, count);
      checkFoldedLength(this.value.length * reps);
      return new StringNode({ value: this.value.repeat(reps), lineNo: this.lineNo });
    }
    throw new NodeRewriteError(`Can't multiply String and ${describeValue(times)}`);
  }

  toString(): string {
    return this.value;
  }

  protected fields() {
    return { value: this.value };
  }
}

export class DictionaryNode extends BaseNode {
  readonly kind = "Dictionary";
  private readonly keyList: NodeValue[];
  private readonly valueList: NodeValue[];

  constructor(args: { keys: NodeValue[]; values: NodeValue[] } & Meta) {
    super();
    if (args.keys.length !== args.values.length) {
      throw new Error(`Dictionary needs as many keys as values (${args.keys.length} != ${args.values.length})`);
    }
    this.keyList = [...args.keys];
    this.valueList = [...args.values];
    applyMeta(this, args);
  }

  get keys(): readonly NodeValue[] {
    return this.keyList;
  }

  get values(): readonly NodeValue[] {
    return this.valueList;
  }

  entries(): Array<[NodeValue, NodeValue]> {
    return this.keyList.map((k, idx): [NodeValue, NodeValue] => [k, this.valueList[idx]]);
  }

  override get isStatic(): boolean {
    return this.keyList.every(isStaticValue) && this.valueList.every(isStaticValue);
  }

  override children(): Slot[] {
    return [...this.listSlots("keys", this.keyList), ...this.listSlots("values", this.valueList)];
  }

  protected fields() {
    return { keys: this.keyList.map(valueToJson), values: this.valueList.map(valueToJson) };
  }
}

export class VariableNode extends BaseNode {
  readonly kind = "Variable";
  readonly name: string;
  readonly varType: string;
  private bound: NodeValue;

  constructor(args: { name: string; value?: NodeValue; varType?: string } & Meta) {
    super();
    this.name = args.name;
    this.bound = args.value ?? null;
    this.varType = args.varType ?? "assign";
    applyMeta(this, args);
  }

  get value(): NodeValue {
    return this.bound;
  }

  override get fullName(): string | null {
    if (this.resolvedName !== null) return this.resolvedName;
    return fullNameOf(this.bound);
  }

  override children(): Slot[] {
    return [
      this.fieldSlot(
        "value",
        () => this.bound,
        (value) => {
          this.bound = value;
        }
      )
    ];
  }

  protected fields() {
    return { name: this.name, value: valueToJson(this.bound), var_type: this.varType };
  }
}

export class AttributeNode extends BaseNode {
  readonly kind = "Attribute";
  readonly attr: string;
  readonly action: string;
  private sourceValue: NodeValue;

  constructor(args: { source: NodeValue; attr: string; action?: string } & Meta) {
    super();
    this.sourceValue = args.source;
    this.attr = args.attr;
    this.action = args.action ?? "load";
    applyMeta(this, args);
  }

  get source(): NodeValue {
    return this.sourceValue;
  }

  // Only one level of indirection: an attribute of an import.
  override get fullName(): string | null {
    if (this.resolvedName !== null) return this.resolvedName;
    if (this.sourceValue instanceof ImportNode) return `${this.sourceValue.module}.${this.attr}`;
    return null;
  }

  override children(): Slot[] {
    return [
      this.fieldSlot(
        "source",
        () => this.sourceValue,
        (value) => {
          this.sourceValue = value;
        }
      )
    ];
  }

  protected fields() {
    return { source: valueToJson(this.sourceValue), attr: this.attr, action: this.action };
  }
}

export class CompareNode extends BaseNode {
  readonly kind = "Compare";
  readonly ops: readonly string[];
  private leftValue: NodeValue;
  private readonly comparatorList: NodeValue[];

  constructor(args: { left: NodeValue; ops: string[]; comparators: NodeValue[] } & Meta) {
    super();
    this.leftValue = args.left;
    this.ops = [...args.ops];
    this.comparatorList = [...args.comparators];
    applyMeta(this, args);
  }

  get left(): NodeValue {
    return this.leftValue;
  }

  get comparators(): readonly NodeValue[] {
    return this.comparatorList;
  }

  override get isStatic(): boolean {
    return isStaticValue(this.leftValue) && this.comparatorList.every(isStaticValue);
  }

  override children(): Slot[] {
    return [
      this.fieldSlot(
        "left",
        () => this.leftValue,
        (value) => {
          this.leftValue = value;
        }
      ),
      ...this.listSlots("comparators", this.comparatorList)
    ];
  }

  protected fields() {
    return { left: valueToJson(this.leftValue), ops: [...this.ops], comparators: this.comparatorList.map(valueToJson) };
  }
}

export class FunctionDefNode extends BaseNode {
  readonly kind = "FunctionDef";
  readonly name: string;
  private parameterValue: NodeValue;
  private readonly bodyList: NodeValue[];
  private readonly decoratorList: NodeValue[];
  private returnsValue: NodeValue;

  constructor(
    args: { name: string; parameters: NodeValue; body: NodeValue[]; decorators?: NodeValue[]; returns?: NodeValue } & Meta
  ) {
    super();
    this.name = args.name;
    this.parameterValue = args.parameters;
    this.bodyList = [...args.body];
    this.decoratorList = [...(args.decorators ?? [])];
    this.returnsValue = args.returns ?? null;
    applyMeta(this, args);
  }

  get parameters(): NodeValue {
    return this.parameterValue;
  }

  get body(): readonly NodeValue[] {
    return this.bodyList;
  }

  get decorators(): readonly NodeValue[] {
    return this.decoratorList;
  }

  get returns(): NodeValue {
    return this.returnsValue;
  }

  override children(): Slot[] {
    return [
      this.fieldSlot(
        "parameters",
        () => this.parameterValue,
        (value) => {
          this.parameterValue = value;
        }
      ),
      ...this.listSlots("body", this.bodyList),
      ...this.listSlots("decorators", this.decoratorList),
      this.fieldSlot(
        "returns",
        () => this.returnsValue,
        (value) => {
          this.returnsValue = value;
        }
      )
    ];
  }

  protected fields() {
    return {
      function_name: this.name,
      parameters: valueToJson(this.parameterValue),
      body: this.bodyList.map(valueToJson),
      decorators: this.decoratorList.map(valueToJson),
      returns: valueToJson(this.returnsValue)
    };
  }
}

export type KeywordArguments = Map<string, NodeValue> | DictionaryNode;

export class CallNode extends BaseNode {
  readonly kind = "Call";
  private funcValue: NodeValue;
  private readonly argList: NodeValue[];
  private kwargValue: KeywordArguments;

  constructor(args: { func: NodeValue; args?: NodeValue[]; kwargs?: KeywordArguments | Record<string, NodeValue> } & Meta) {
    super();
    this.funcValue = args.func;
    this.argList = [...(args.args ?? [])];
    const kwargs = args.kwargs ?? new Map<string, NodeValue>();
    this.kwargValue =
      kwargs instanceof DictionaryNode || kwargs instanceof Map ? kwargs : new Map(Object.entries(kwargs));
    applyMeta(this, args);
  }

  get func(): NodeValue {
    return this.funcValue;
  }

  get args(): readonly NodeValue[] {
    return this.argList;
  }

  /** Either a plain keyword mapping or a Dictionary node passed as `**kwargs`. */
  get kwargs(): KeywordArguments {
    return this.kwargValue;
  }

  override get fullName(): string | null {
    if (this.resolvedName !== null) return this.resolvedName;
    return fullNameOf(this.funcValue);
  }

  override children(): Slot[] {
    const kwargSlots =
      this.kwargValue instanceof DictionaryNode
        ? [
            this.fieldSlot(
              "kwargs",
              () => this.kwargValue,
              (value) => {
                if (!(value instanceof DictionaryNode)) {
                  throw new NodeRewriteError(`Call keyword arguments can only be replaced by a Dictionary, got ${describeValue(value)}`);
                }
                this.kwargValue = value;
              }
            )
          ]
        : this.mapSlots("kwargs", this.kwargValue);

    return [
      ...this.listSlots("args", this.argList),
      ...kwargSlots,
      this.fieldSlot(
        "func",
        () => this.funcValue,
        (value) => {
          this.funcValue = value;
        }
      )
    ];
  }

  protected fields() {
    const kwargs: { [key: string]: JsonValue } = {};
    if (this.kwargValue instanceof Map) {
      for (const [key, value] of this.kwargValue) kwargs[key] = valueToJson(value);
    }
    return {
      func: valueToJson(this.funcValue),
      args: this.argList.map(valueToJson),
      kwargs: this.kwargValue instanceof DictionaryNode ? this.kwargValue.toJSON() : kwargs
    };
  }
}

/**
 * Formal parameters of a function definition. `defaults` align with the tail
 * of `args`; keyword-only defaults are keyed by parameter name.
 */
export class ArgumentsNode extends BaseNode {
  readonly kind = "Arguments";
  readonly args: readonly string[];
  readonly vararg: string | null;
  readonly kwonlyargs: readonly string[];
  readonly kwarg: string | null;
  private readonly defaultList: NodeValue[];
  private readonly kwDefaultMap: Map<string, NodeValue>;

  constructor(
    args: {
      args: string[];
      vararg?: string | null;
      kwonlyargs?: string[];
      kwarg?: string | null;
      defaults?: NodeValue[];
      kwDefaults?: Map<string, NodeValue>;
    } & Meta
  ) {
    super();
    this.args = [...args.args];
    this.vararg = args.vararg ?? null;
    this.kwonlyargs = [...(args.kwonlyargs ?? [])];
    this.kwarg = args.kwarg ?? null;
    this.defaultList = [...(args.defaults ?? [])];
    this.kwDefaultMap = new Map(args.kwDefaults ?? []);
    if (this.defaultList.length > this.args.length) {
      throw new Error(`Arguments has more defaults (${this.defaultList.length}) than parameters (${this.args.length})`);
    }
    applyMeta(this, args);
  }

  get defaults(): readonly NodeValue[] {
    return this.defaultList;
  }

  get kwDefaults(): ReadonlyMap<string, NodeValue> {
    return this.kwDefaultMap;
  }

  override children(): Slot[] {
    return [...this.listSlots("defaults", this.defaultList), ...this.mapSlots("kw_defaults", this.kwDefaultMap)];
  }

  protected fields() {
    const kwDefaults: { [key: string]: JsonValue } = {};
    for (const [key, value] of this.kwDefaultMap) kwDefaults[key] = valueToJson(value);
    return {
      args: [...this.args],
      vararg: this.vararg,
      kwonlyargs: [...this.kwonlyargs],
      kwarg: this.kwarg,
      defaults: this.defaultList.map(valueToJson),
      kw_defaults: kwDefaults
    };
  }
}

export type ImportForm = "import" | "from";

export class ImportNode extends BaseNode {
  readonly kind = "Import";
  readonly module: string;
  readonly alias: string;
  readonly form: ImportForm;

  constructor(args: { module: string; alias?: string; form?: ImportForm } & Meta) {
    super();
    this.module = args.module;
    this.alias = args.alias ?? args.module;
    this.form = args.form ?? "import";
    applyMeta(this, args);
  }

  override get fullName(): string | null {
    return this.resolvedName ?? this.module;
  }

  clone(meta: Meta = {}): ImportNode {
    return new ImportNode({ module: this.module, alias: this.alias, form: this.form, lineNo: meta.lineNo ?? this.lineNo });
  }

  protected fields() {
    return { module: this.module, alias: this.alias, form: this.form };
  }
}

export class BinaryOpNode extends BaseNode {
  readonly kind = "BinaryOp";
  readonly op: string;
  private leftValue: NodeValue;
  private rightValue: NodeValue;

  constructor(args: { op: string; left: NodeValue; right: NodeValue } & Meta) {
    super();
    this.op = args.op;
    this.leftValue = args.left;
    this.rightValue = args.right;
    applyMeta(this, args);
  }

  get left(): NodeValue {
    return this.leftValue;
  }

  get right(): NodeValue {
    return this.rightValue;
  }

  override get isStatic(): boolean {
    return isStaticValue(this.leftValue) && isStaticValue(this.rightValue);
  }

  override children(): Slot[] {
    return [
      this.fieldSlot(
        "left",
        () => this.leftValue,
        (value) => {
          this.leftValue = value;
        }
      ),
      this.fieldSlot(
        "right",
        () => this.rightValue,
        (value) => {
          this.rightValue = value;
        }
      )
    ];
  }

  protected fields() {
    return { op: this.op, left: valueToJson(this.leftValue), right: valueToJson(this.rightValue) };
  }
}

export class PrintNode extends BaseNode {
  readonly kind = "Print";
  private readonly valueList: NodeValue[];
  private destValue: NodeValue;

  constructor(args: { values: NodeValue[]; dest?: NodeValue } & Meta) {
    super();
    this.valueList = [...args.values];
    this.destValue = args.dest ?? null;
    applyMeta(this, args);
  }

  get values(): readonly NodeValue[] {
    return this.valueList;
  }

  get dest(): NodeValue {
    return this.destValue;
  }

  override children(): Slot[] {
    return [
      ...this.listSlots("values", this.valueList),
      this.fieldSlot(
        "dest",
        () => this.destValue,
        (value) => {
          this.destValue = value;
        }
      )
    ];
  }

  protected fields() {
    return { values: this.valueList.map(valueToJson), dest: valueToJson(this.destValue) };
  }
}

export type TreeNode =
  | NumberNode
  | StringNode
  | DictionaryNode
  | VariableNode
  | AttributeNode
  | CompareNode
  | FunctionDefNode
  | CallNode
  | ArgumentsNode
  | ImportNode
  | BinaryOpNode
  | PrintNode;

export type NodeOfKind<K extends NodeKind> = Extract<TreeNode, { kind: K }>;

export function isTreeNode(value: NodeValue): value is TreeNode {
  return value instanceof BaseNode;
}

export function isNodeRecord(value: NodeValue): value is NodeRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof BaseNode);
}

export function isStaticValue(value: NodeValue): boolean {
  if (value === null || typeof value !== "object") return true;
  if (isTreeNode(value)) return value.isStatic;
  return false;
}

export function fullNameOf(value: NodeValue): string | null {
  if (isTreeNode(value)) return value.fullName;
  if (typeof value === "string") return value;
  return null;
}

export function valueToJson(value: NodeValue): JsonValue {
  if (value === null || typeof value !== "object") return value;
  if (isTreeNode(value)) return value.toJSON();
  if (Array.isArray(value)) return value.map(valueToJson);
  const out: { [key: string]: JsonValue } = {};
  for (const [key, child] of Object.entries(value)) out[key] = valueToJson(child);
  return out;
}

function describeValue(value: NodeValue): string {
  if (isTreeNode(value)) return `\`${value.kind}\``;
  if (Array.isArray(value)) return "`list`";
  if (value === null) return "`null`";
  return `\`${typeof value}\``;
}
