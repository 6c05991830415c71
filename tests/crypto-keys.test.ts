import { describe, expect, test } from "vitest";
import { AttributeNode, CallNode, ImportNode, NumberNode, VariableNode, type NodeValue } from "../src/ast/nodes.js";
import { createCryptoKeyRule } from "../src/ast/rules/cryptoKeys.js";
import { TreeRoot, visitTree } from "../src/ast/visitor.js";
import { DEFAULT_SETTINGS, type Settings } from "../src/lib/settings.js";

const RSA = "cryptography.hazmat.primitives.asymmetric.rsa";

function keyCall(module: string, fn: string, args: NodeValue[], kwargs: Record<string, NodeValue> = {}): CallNode {
  return new CallNode({
    func: new AttributeNode({ source: new ImportNode({ module }), attr: fn }),
    args,
    kwargs,
    lineNo: 7
  });
}

function detect(call: CallNode, settings: Settings = DEFAULT_SETTINGS) {
  return visitTree(new TreeRoot({ body: [call] }), [createCryptoKeyRule(settings)], { location: "keys.py" }).findings;
}

describe("crypto key generation rule", () => {
  test("a small key size passed by keyword gets the weak-key score", () => {
    const findings = detect(keyCall(RSA, "generate_private_key", [], { public_exponent: new NumberNode({ value: 65537 }), key_size: new NumberNode({ value: 1024 }) }));
    expect(findings).toHaveLength(1);
    expect(findings[0]).toEqual({
      type: "CryptoKeyGeneration",
      location: "keys.py",
      message: "Generation of cryptography key detected",
      signature: "crypto#gen_key#keys.py#7",
      score: 100,
      line_no: 7,
      extra: { function: `${RSA}.generate_private_key`, key_type: "rsa", key_size: 1024 }
    });
  });

  test("a positional key size at the minimum keeps the default score", () => {
    const findings = detect(keyCall(RSA, "generate_private_key", [new NumberNode({ value: 4096 })]));
    expect(findings.map((f) => [f.extra.key_size, f.score])).toEqual([[4096, 0]]);
  });

  test("pycryptodome entry points use the bits parameter", () => {
    const findings = detect(keyCall("Cryptodome.PublicKey.DSA", "generate", [new NumberNode({ value: 1024 })]));
    expect(findings.map((f) => [f.extra.key_type, f.extra.key_size, f.score])).toEqual([["dsa", 1024, 100]]);
  });

  test("a key size that is not a literal is not reported", () => {
    expect(detect(keyCall(RSA, "generate_private_key", [new VariableNode({ name: "size", varType: "name" })]))).toEqual([]);
  });

  test("calls that do not bind to the known signature are not reported", () => {
    const call = keyCall(RSA, "generate_private_key", [new NumberNode({ value: 1024 })], { unknown_flag: true });
    expect(detect(call)).toEqual([]);
    expect(detect(keyCall(RSA, "generate_private_key", []))).toEqual([]);
  });

  test("functions outside the catalogue are ignored", () => {
    expect(detect(keyCall("cryptography.hazmat.primitives.asymmetric.ec", "generate_private_key", [1024]))).toEqual([]);
  });

  test("thresholds and scores come from the settings", () => {
    const settings: Settings = {
      ...DEFAULT_SETTINGS,
      min_key_sizes: { rsa: 4096, dsa: 2048 },
      scores: { "crypto-weak-key": 80, "crypto-gen-key": 5 }
    };
    const weak = detect(keyCall(RSA, "generate_private_key", [new NumberNode({ value: 2048 })]), settings);
    const fine = detect(keyCall(RSA, "generate_private_key", [new NumberNode({ value: 4096 })]), settings);
    expect(weak.map((f) => f.score)).toEqual([80]);
    expect(fine.map((f) => f.score)).toEqual([5]);
  });
});
