import * as Node from "../../src/Node";
import * as Schema from "../../src/Schema";

/** A container holding a list keyed by three leaves. */
export const makeSchema = (): Schema.SchemaEntry =>
  Schema.Container("compound", [
    Schema.List(
      "list",
      ["key1", "key2", "key3"],
      [
        Schema.Leaf("key1", { kind: "string" }),
        Schema.Leaf("key2", { kind: "int32" }),
        Schema.Leaf("key3", { kind: "int32" }),
        Schema.Container("outer", [Schema.Container("inner", [Schema.Leaf("leaf-field", { kind: "int32" })])]),
      ]
    ),
  ]);

export const Inner: Node.NodeType = Node.Struct("Inner", {
  leafField: Node.Leaf("leaf-field", "number"),
});

export const Outer: Node.NodeType = Node.Struct("Outer", {
  inner: Node.Child("inner", () => Inner),
});

export const ListEntry: Node.NodeType = Node.Struct("ListEntry", {
  key1: Node.Leaf("key1"),
  key2: Node.Leaf("key2", "number"),
  key3: Node.Leaf("key3", "number"),
  outer: Node.Child("outer", () => Outer),
});

export const Compound: Node.NodeType = Node.Struct("Compound", {
  list: Node.List("list", () => ListEntry, ["key1", "key2", "key3"]),
});

/** Entry {forty-two, 42, 43} with outer/inner/leaf-field = 1234. */
export const makeCompound = (): Node.StructNode => {
  const root = Compound.create();
  const entry = root.getOrCreateList("list").getOrCreate({ key1: "forty-two", key2: 42, key3: 43 });
  entry.getOrCreateChild("outer").getOrCreateChild("inner").set("leafField", 1234);
  return root;
};
