import { ImportNode, VariableNode } from "../nodes.js";
import { defineRule, type NodeRule } from "../visitor.js";

/**
 * Replaces names that refer to an imported module or symbol with a copy of the
 * Import node, so `rsa.generate_private_key` resolves to its dotted path.
 *
 * The alias table outlives a single pass, so when another rewrite forces a
 * further pass, names visited before their import in breadth-first order
 * resolve then.
 */
export function createImportResolver(): NodeRule {
  const imports = new Map<string, ImportNode>();

  return defineRule({
    id: "resolve_imports",
    kinds: ["Import", "Variable"],
    visit(node, context) {
      if (node instanceof ImportNode) {
        imports.set(node.alias, node);
        return;
      }
      if (!(node instanceof VariableNode) || node.varType !== "name" || node.value !== null) return;
      const target = imports.get(node.name);
      if (!target) return;
      context.replace(target.clone({ lineNo: node.lineNo }));
    }
  });
}
