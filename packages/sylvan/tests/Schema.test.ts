import { describe, expect, it } from "@effect/vitest";
import { SchemaMismatchError } from "../src/errors";
import * as Schema from "../src/Schema";
import * as Device from "./fixtures/device";

describe("Schema", () => {
  it("should link children to their parent", () => {
    const root = Device.makeSchema();
    const iface = root.child("interfaces")?.child("interface");

    expect(iface?.parent?.name).toBe("interfaces");
    expect(iface?.root()).toBe(root);
    expect(iface?.path()).toBe("/device/interfaces/interface");
    expect(iface?.depth()).toBe(3);
  });

  it("should inherit the module from the nearest ancestor", () => {
    const root = Device.makeSchema();

    expect(root.module).toBeUndefined();
    expect(root.child("interfaces")?.child("interface")?.child("config")?.module).toBe("openconfig-interfaces");
    expect(root.child("system")?.module).toBe("openconfig-system");
  });

  it("should classify entries", () => {
    const root = Device.makeSchema();
    const iface = root.child("interfaces")?.child("interface");
    const key = iface?.child("name");

    expect(root.fakeRoot).toBe(true);
    expect(iface?.isKeyedList()).toBe(true);
    expect(iface?.isDir()).toBe(true);
    expect(key?.isLeaf()).toBe(true);
    expect(key?.isLeafRef()).toBe(true);
  });

  it("should reject duplicate children", () => {
    expect(() =>
      Schema.Container("c", [Schema.Leaf("a", { kind: "string" }), Schema.Leaf("a", { kind: "string" })])
    ).toThrow(SchemaMismatchError);
  });

  it("should reject attaching an entry twice", () => {
    const leaf = Schema.Leaf("a", { kind: "string" });
    Schema.Container("first", [leaf]);

    expect(() => Schema.Container("second", [leaf])).toThrow(SchemaMismatchError);
  });

  describe("firstNonChoiceOrCase", () => {
    it("should look through choice and case nodes", () => {
      const entry = Schema.Container("c", [
        Schema.Leaf("plain", { kind: "string" }),
        Schema.Choice("transport", [
          Schema.Case("tcp", [Schema.Leaf("port", { kind: "uint16" })]),
          Schema.Case("unix", [Schema.Leaf("socket", { kind: "string" })]),
        ]),
      ]);

      expect([...Schema.firstNonChoiceOrCase(entry).keys()]).toEqual(["plain", "port", "socket"]);
    });
  });

  it("should strip module prefixes", () => {
    expect(Schema.stripModulePrefix("openconfig-interfaces:interface")).toBe("interface");
    expect(Schema.stripModulePrefix("interface")).toBe("interface");
    expect(Schema.stripModulePrefixes(["a:b", "c"])).toEqual(["b", "c"]);
  });
});
