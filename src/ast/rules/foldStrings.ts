import { NodeRewriteError, StringNode } from "../nodes.js";
import { defineRule } from "../visitor.js";

export const foldStrings = defineRule({
  id: "fold_strings",
  kinds: ["BinaryOp"],
  visit(node, context) {
    if (!(node.left instanceof StringNode)) return;
    let folded: StringNode;
    try {
      if (node.op === "Add") folded = node.left.concat(node.right);
      else if (node.op === "Mult") folded = node.left.repeat(node.right);
      else return;
    } catch (e) {
      if (e instanceof NodeRewriteError) return;
      throw e;
    }
    folded.lineNo = node.lineNo;
    context.replace(folded);
  }
});
