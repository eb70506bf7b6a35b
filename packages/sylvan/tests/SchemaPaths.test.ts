import { describe, expect, it } from "@effect/vitest";
import { SchemaMismatchError } from "../src/errors";
import * as Node from "../src/Node";
import * as Schema from "../src/Schema";
import * as SchemaPaths from "../src/SchemaPaths";
import * as Trace from "../src/Trace";
import * as Device from "./fixtures/device";

describe("SchemaPaths", () => {
  describe("schemaPaths", () => {
    it("should split alternatives and strip module prefixes", () => {
      const field = Node.Leaf("/oc-if:config/oc-if:name|oc-if:name");

      expect(SchemaPaths.schemaPaths(field)).toEqual([["config", "name"], ["name"]]);
    });

    it("should put the root name first", () => {
      const field = Node.Child("", () => Device.System, { rootName: "system" });

      expect(SchemaPaths.schemaPaths(field)).toEqual([["system"]]);
    });

    it("should reject a field without path metadata", () => {
      expect(() => SchemaPaths.schemaPaths(Node.Leaf(""))).toThrow(SchemaMismatchError);
    });
  });

  describe("shadowSchemaPaths", () => {
    it("should return the shadow alternatives", () => {
      expect(SchemaPaths.shadowSchemaPaths(Device.Interface.fields["name"] ?? Node.Leaf("x"))).toEqual([
        ["state", "name"],
      ]);
    });

    it("should return nothing when there is no shadow path", () => {
      expect(SchemaPaths.shadowSchemaPaths(Node.Leaf("config/mtu"))).toEqual([]);
    });
  });

  describe("pathToSchema", () => {
    it("should pick the first multi-segment alternative", () => {
      expect(SchemaPaths.pathToSchema(Node.Leaf("name|config/name|state/name"))).toEqual(["config", "name"]);
    });

    it("should keep a single alternative as is", () => {
      expect(SchemaPaths.pathToSchema(Node.Leaf("name"))).toEqual(["name"]);
    });

    it("should reject alternatives that are all single segments", () => {
      expect(() => SchemaPaths.pathToSchema(Node.Leaf("name|alias"))).toThrow(SchemaMismatchError);
    });
  });

  describe("resolve", () => {
    const schema = Device.makeSchema();
    const iface = schema.child("interfaces")?.child("interface");

    it("should walk a multi-segment route", () => {
      const found = iface === undefined ? undefined : SchemaPaths.resolve(iface, Node.Leaf("config/mtu"));

      expect(found?.path()).toBe("/device/interfaces/interface/config/mtu");
    });

    it("should resolve the canonical alternative", () => {
      const found = iface === undefined ? undefined : SchemaPaths.resolve(iface, Node.Leaf("name|config/name"));

      expect(found?.path()).toBe("/device/interfaces/interface/config/name");
    });

    it("should skip a first segment repeating the container name", () => {
      const system = schema.child("system");
      const found = system === undefined ? undefined : SchemaPaths.resolve(system, Node.Leaf("system/config/hostname"));

      expect(found?.path()).toBe("/device/system/config/hostname");
    });

    it("should resolve a root name directly", () => {
      const found = SchemaPaths.resolve(schema, Node.Child("", () => Device.System, { rootName: "system" }));

      expect(found?.name).toBe("system");
    });

    it("should find a last segment below choice and case nodes", () => {
      const entry = Schema.Container("server", [
        Schema.Choice("transport", [Schema.Case("tcp", [Schema.Leaf("port", { kind: "uint16" })])]),
      ]);

      expect(SchemaPaths.resolve(entry, Node.Leaf("port", "number"))?.name).toBe("port");
    });

    it("should find a first segment below choice and case nodes", () => {
      const entry = Schema.Container("server", [
        Schema.Choice("transport", [
          Schema.Case("tcp", [Schema.Container("tcp", [Schema.Leaf("port", { kind: "uint16" })])]),
        ]),
      ]);

      expect(SchemaPaths.resolve(entry, Node.Leaf("tcp/port", "number"))?.path()).toBe(
        "/server/transport/tcp/tcp/port"
      );
    });

    it("should return undefined for a route that does not exist", () => {
      expect(SchemaPaths.resolve(schema, Node.Leaf("routing/config/id"))).toBeUndefined();
    });

    it("should log the resolution to the trace", () => {
      const trace = Trace.make();
      SchemaPaths.resolve(schema, Node.Child("system", () => Device.System), trace);

      expect(trace.flush()).toEqual(["resolve system in device: /device/system"]);
    });
  });

  describe("resolvePreferShadow", () => {
    it("should follow the shadow path", () => {
      const iface = Device.makeSchema().child("interfaces")?.child("interface");
      const field = Device.Interface.fields["name"] ?? Node.Leaf("x");
      const found = iface === undefined ? undefined : SchemaPaths.resolvePreferShadow(iface, field);

      expect(found?.path()).toBe("/device/interfaces/interface/state/name");
    });
  });

  describe("resolveOrThrow", () => {
    it("should name the type and field when nothing resolves", () => {
      expect(() => SchemaPaths.resolveOrThrow(Device.makeSchema(), Node.Leaf("nowhere"), "Device", "nowhere")).toThrow(
        "could not find schema for type Device, field nowhere (path nowhere) below /device"
      );
    });
  });

  it("should use the root name as the canonical route", () => {
    expect(SchemaPaths.canonicalRoute(Node.Child("", () => Device.System, { rootName: "system" }))).toEqual(["system"]);
    expect(SchemaPaths.canonicalRoute(Node.Leaf("oc:name|oc:config/oc:name"))).toEqual(["config", "name"]);
  });
});
