import { describe, expect, it } from "@effect/vitest";
import { InvalidArgumentError } from "../src/errors";
import * as Path from "../src/Path";

describe("Path", () => {
  describe("fromString", () => {
    it("should parse plain element names", () => {
      const path = Path.fromString("/interfaces/interface/config");

      expect(path.steps).toEqual([{ name: "interfaces" }, { name: "interface" }, { name: "config" }]);
    });

    it("should parse one or more keys per element", () => {
      const path = Path.fromString("/list[key1=forty-two][key2=42]/outer");

      expect(path.steps[0]).toEqual({ name: "list", key: { key1: "forty-two", key2: "42" } });
      expect(path.steps[1]).toEqual({ name: "outer" });
    });

    it("should keep slashes inside key values", () => {
      const path = Path.fromString("/interfaces/interface[name=Ethernet1/1]/state");

      expect(path.steps).toHaveLength(3);
      expect(path.steps[1]?.key).toEqual({ name: "Ethernet1/1" });
    });

    it("should unescape an escaped closing bracket", () => {
      const path = Path.fromString("/a[k=x\\]y]");

      expect(path.steps[0]?.key).toEqual({ k: "x]y" });
    });

    it("should return the empty path for the root", () => {
      expect(Path.isEmpty(Path.fromString("/"))).toBe(true);
      expect(Path.isEmpty(Path.fromString(""))).toBe(true);
    });

    it("should reject an unterminated key", () => {
      expect(() => Path.fromString("/a[k=v")).toThrow(InvalidArgumentError);
    });

    it("should reject a key without a value separator", () => {
      expect(() => Path.fromString("/a[kv]")).toThrow(InvalidArgumentError);
    });
  });

  describe("toString", () => {
    it("should render keys sorted by name", () => {
      const path = Path.make([Path.step("list", { key2: "42", key1: "forty-two" }), Path.step("outer")]);

      expect(Path.toString(path)).toBe("/list[key1=forty-two][key2=42]/outer");
    });

    it("should prefix the origin", () => {
      expect(Path.toString(Path.make([Path.step("a")], "openconfig"))).toBe("openconfig:/a");
    });

    it("should render the empty path as a single slash", () => {
      expect(Path.toString(Path.empty)).toBe("/");
    });

    it("should read back what it renders", () => {
      const rendered = "/interfaces/interface[name=eth0]/subinterfaces/subinterface[index=0]/config/index";

      expect(Path.toString(Path.fromString(rendered))).toBe(rendered);
    });
  });

  describe("utilities", () => {
    it("should drop an absolute marker", () => {
      const path = Path.make([Path.step(""), Path.step("a")]);

      expect(Path.stripAbsoluteMarker(path).steps).toEqual([{ name: "a" }]);
    });

    it("should match and trim name prefixes", () => {
      const path = Path.fromString("/a/b[k=v]/c");

      expect(Path.matchesPrefix(path, ["a", "b"])).toBe(true);
      expect(Path.matchesPrefix(path, ["a", "c"])).toBe(false);
      expect(Path.toString(Path.trimPrefix(path, ["a", "b"]))).toBe("/c");
      expect(Path.trimPrefix(path, ["x"])).toBe(path);
    });

    it("should pop the first step and take the parent", () => {
      const path = Path.fromString("/a/b/c");

      expect(Path.toString(Path.pop(path))).toBe("/b/c");
      expect(Path.toString(Path.parent(path))).toBe("/a/b");
      expect(Path.head(path)).toEqual({ name: "a" });
    });

    it("should compare keys regardless of insertion order", () => {
      const a = Path.make([Path.step("l", { x: "1", y: "2" })]);
      const b = Path.make([Path.step("l", { y: "2", x: "1" })]);
      const c = Path.make([Path.step("l", { x: "1" })]);

      expect(Path.equals(a, b)).toBe(true);
      expect(Path.equals(a, c)).toBe(false);
    });

    it("should append and concatenate", () => {
      const base = Path.fromNames(["a"]);

      expect(Path.toString(Path.append(base, Path.step("b", { k: "v" })))).toBe("/a/b[k=v]");
      expect(Path.toString(Path.concat(base, Path.fromNames(["c", "d"])))).toBe("/a/c/d");
    });
  });
});
