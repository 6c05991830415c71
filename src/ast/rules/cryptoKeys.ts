import { createFinding, buildSignature, type Finding } from "../../lib/finding.js";
import { getMinimumKeySize, getScoreOrDefault, type Settings } from "../../lib/settings.js";
import { applySignature, type BoundValue, type CallShape } from "../binder.js";
import { NumberNode, type CallNode } from "../nodes.js";
import { defineRule, type Context, type NodeRule } from "../visitor.js";

export type KeyFamily = "rsa" | "dsa";

type KeyGenerator = {
  type: KeyFamily;
  lib: "cryptography" | "crypto";
};

const SHAPES: Record<KeyGenerator["lib"], { sizeParam: string; shape: CallShape }> = {
  cryptography: {
    sizeParam: "key_size",
    shape: { positional: ["key_size"], keywords: { public_exponent: null, backend: null } }
  },
  crypto: {
    sizeParam: "bits",
    shape: { positional: ["bits"], keywords: { randfunc: null, domain: null, e: null } }
  }
};

export const KEY_GENERATORS: Readonly<Record<string, KeyGenerator>> = {
  "cryptography.hazmat.primitives.asymmetric.dsa.generate_private_key": { type: "dsa", lib: "cryptography" },
  "cryptography.hazmat.primitives.asymmetric.dsa.generate_parameters": { type: "dsa", lib: "cryptography" },
  "cryptography.hazmat.primitives.asymmetric.rsa.generate_private_key": { type: "rsa", lib: "cryptography" },
  "cryptography.hazmat.primitives.asymmetric.rsa.generate_parameters": { type: "rsa", lib: "cryptography" },
  "Crypto.PublicKey.DSA.generate": { type: "dsa", lib: "crypto" },
  "Crypto.PublicKey.RSA.generate": { type: "rsa", lib: "crypto" },
  "Cryptodome.PublicKey.DSA.generate": { type: "dsa", lib: "crypto" },
  "Cryptodome.PublicKey.RSA.generate": { type: "rsa", lib: "crypto" }
};

function literalKeySize(value: BoundValue | undefined): number | null {
  if (value instanceof NumberNode) return Number.isInteger(value.value) ? value.value : null;
  if (typeof value === "number" && Number.isInteger(value)) return value;
  return null;
}

/**
 * Reports RSA/DSA key generation calls together with the key size when it is
 * a literal. Sizes below the configured minimum for the key family get the
 * weak-key score.
 */
export function createCryptoKeyRule(settings: Settings): NodeRule {
  const gen = (call: CallNode, context: Context, info: KeyGenerator, keySize: number): Finding => {
    const weak = keySize < getMinimumKeySize(settings, info.type);
    return createFinding({
      type: "CryptoKeyGeneration",
      location: context.location,
      message: "Generation of cryptography key detected",
      signature: buildSignature("crypto", "gen_key", context.location, call.lineNo),
      score: weak ? getScoreOrDefault(settings, "crypto-weak-key", 100) : getScoreOrDefault(settings, "crypto-gen-key", 0),
      line_no: call.lineNo,
      extra: {
        function: call.fullName,
        key_type: info.type,
        key_size: keySize
      }
    });
  };

  return defineRule({
    id: "cryptography_generate_keys",
    kinds: ["Call"],
    *visit(call, context) {
      const name = call.fullName;
      if (name === null) return;
      const info = KEY_GENERATORS[name];
      if (!info) return;

      const { sizeParam, shape } = SHAPES[info.lib];
      const result = applySignature(call, shape);
      // A call that doesn't fit the shape is just not a match.
      if (!result.ok) return;

      const keySize = literalKeySize(result.bound.get(sizeParam));
      if (keySize === null) return;
      yield gen(call, context, info, keySize);
    }
  });
}
