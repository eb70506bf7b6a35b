import { describe, expect, it } from "@effect/vitest";
import { InvalidArgumentError } from "../src/errors";
import * as Merge from "../src/Merge";
import * as Device from "./fixtures/device";

describe("Merge", () => {
  it("should let source leaves win", () => {
    const dst = Device.System.create().set("hostname", "old");
    const src = Device.System.create().set("hostname", "new").set("dnsServer", ["192.0.2.53"]);
    const merged = Merge.merge(dst, src);

    expect(merged.leaf("hostname")).toBe("new");
    expect(merged.leafList("dnsServer")).toEqual(["192.0.2.53"]);
    expect(dst.leaf("hostname")).toBe("old");
    expect(dst.has("dnsServer")).toBe(false);
  });

  it("should keep destination leaves the source does not set", () => {
    const dst = Device.System.create().set("hostname", "kept");
    const merged = Merge.merge(dst, Device.System.create());

    expect(merged.leaf("hostname")).toBe("kept");
  });

  it("should take the union of list entries", () => {
    const dst = Device.makeDevice();
    const src = Device.Device.create();
    src.getOrCreateList("interface").getOrCreate("eth1").set("mtu", 9000);
    src.getOrCreateList("interface").getOrCreate("eth0").set("description", "uplink");
    const merged = Merge.merge(dst, src);

    const interfaces = merged.list("interface");
    expect(interfaces?.keys()).toEqual(["eth0", "eth1"]);
    expect(interfaces?.get("eth0")?.leaf("mtu")).toBe(1500);
    expect(interfaces?.get("eth0")?.leaf("description")).toBe("uplink");
    expect(interfaces?.get("eth1")?.leaf("mtu")).toBe(9000);
    expect(interfaces?.get("eth1")).not.toBe(src.list("interface")?.get("eth1"));
  });

  it("should copy a container only the source holds", () => {
    const src = Device.Device.create();
    src.getOrCreateChild("system").set("hostname", "r1");
    const merged = Merge.merge(Device.Device.create(), src);

    expect(merged.child("system")?.leaf("hostname")).toBe("r1");
    expect(merged.child("system")).not.toBe(src.child("system"));
  });

  it("should modify the destination in place with mergeInto", () => {
    const dst = Device.System.create();
    Merge.mergeInto(dst, Device.System.create().set("hostname", "r1"));

    expect(dst.leaf("hostname")).toBe("r1");
  });

  it("should reject differing values when conflicts are rejected", () => {
    const dst = Device.System.create().set("hostname", "a");

    expect(() =>
      Merge.merge(dst, Device.System.create().set("hostname", "b"), { rejectConflicts: true })
    ).toThrow("conflicting values for System.hostname while merging");
    expect(
      Merge.merge(dst, Device.System.create().set("hostname", "a"), { rejectConflicts: true }).leaf("hostname")
    ).toBe("a");
  });

  it("should leave the destination untouched when a conflict is rejected", () => {
    const dst = Device.makeDevice();
    const before = dst.clone();
    const src = Device.Device.create();
    src.getOrCreateList("interface").getOrCreate("eth1").set("mtu", 9000);
    src.getOrCreateChild("system").set("hostname", "router-2");

    expect(() => Merge.mergeInto(dst, src, { rejectConflicts: true })).toThrow(
      "conflicting values for System.hostname while merging"
    );
    expect(dst.equals(before)).toBe(true);
  });

  describe("mergeEmptyMaps", () => {
    const nilAndEmpty = () => {
      const absent = Device.Interface.create().set("name", "eth0");
      const empty = absent.clone();
      empty.getOrCreateList("subinterface");
      return { absent, empty };
    };

    it("should be order independent for absent and empty lists", () => {
      const { absent, empty } = nilAndEmpty();
      const policy = { mergeEmptyMaps: true };

      expect(Merge.merge(absent, empty, policy).equals(Merge.merge(empty, absent, policy))).toBe(true);
      expect(Merge.merge(absent, empty, policy).list("subinterface")?.size).toBe(0);
    });

    it("should ignore an empty source list without the policy", () => {
      const { absent, empty } = nilAndEmpty();

      expect(Merge.merge(absent, empty).has("subinterface")).toBe(false);
      expect(Merge.merge(absent, empty).equals(Merge.merge(empty, absent))).toBe(false);
    });
  });

  it("should reject nodes of different types", () => {
    expect(() => Merge.merge(Device.Device.create(), Device.System.create())).toThrow(InvalidArgumentError);
    expect(() => Merge.mergeInto(Device.Device.create(), Device.System.create())).toThrow(InvalidArgumentError);
  });
});
