import type { GraphFunction } from "../function";
import { makeNode, type NodeOf, type Operand, toNodeValue } from "../nodes";
import { typeToString } from "../types";
import type { Variable } from "../variable";
import { scope } from "./common";

/** Prefix of the node name when the destination Variable is created on the fly. */
export const SAVE_NODE_PREFIX = "_save_";

/**
 * Stores `input` into a Variable. Without `output`, a public Variable named
 * `name` with the input's type is created and the node is named
 * `_save_<name>`; otherwise `output` must have exactly the input's type.
 */
export function createSave(
  fn: GraphFunction,
  name: string,
  input: Operand,
  output?: Variable,
): NodeOf<"Save"> {
  const s = scope(fn, "createSave", name);
  const type = s.typeOf(input, "input");

  if (output) {
    s.check(
      fn.module.getVariable(output.id) === output,
      `destination "${output.name}" is not a variable of this module`,
    );
    s.check(
      output.type === type,
      `destination ${typeToString(output.type)} differs from input ${typeToString(type)}`,
    );
    return fn.addNode(
      makeNode("Save", s.nextId(), name, [toNodeValue(input), toNodeValue(output)], [], {}),
    );
  }

  const dest = fn.module.createVariable({
    type,
    name,
    visibility: "public",
    train: "none",
  });
  return fn.addNode(
    makeNode(
      "Save",
      s.nextId(),
      `${SAVE_NODE_PREFIX}${name}`,
      [toNodeValue(input), toNodeValue(dest)],
      [],
      {},
    ),
  );
}
