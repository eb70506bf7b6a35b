import { describe, expect, it } from "@effect/vitest";
import * as Node from "../src/Node";
import * as Schema from "../src/Schema";
import * as Trace from "../src/Trace";
import * as Validate from "../src/Validate";
import * as Device from "./fixtures/device";

const withPrimary = (index: number): Node.StructNode => {
  const device = Device.makeDevice();
  device.list("interface")?.get("eth0")?.set("primarySubinterface", index);
  return device;
};

const PRIMARY = "/device/interfaces/interface/config/primary-subinterface";
const TARGET = "../../subinterfaces/subinterface/config/index";

describe("Validate", () => {
  it("should accept a valid tree", () => {
    expect(Validate.validate(Device.makeSchema(), Device.makeDevice())).toEqual([]);
  });

  describe("leafref integrity", () => {
    it("should accept a reference to an existing target", () => {
      expect(Validate.validate(Device.makeSchema(), withPrimary(1))).toEqual([]);
    });

    it("should reject a reference to a missing subinterface", () => {
      const errors = Validate.validate(Device.makeSchema(), withPrimary(5));

      expect(errors.map((e) => e.kind)).toEqual(["leafref"]);
      expect(errors[0]?.schemaPath).toBe(PRIMARY);
      expect(errors[0]?.message).toBe(`${PRIMARY}: value 5 has leafref path ${TARGET} not equal to any target nodes`);
    });

    it("should skip reference checks when missing data is ignored", () => {
      expect(Validate.validate(Device.makeSchema(), withPrimary(5), { ignoreMissingData: true })).toEqual([]);
    });

    it("should report an empty target set", () => {
      const device = withPrimary(0);
      device.list("interface")?.get("eth0")?.set("subinterface", undefined);
      const errors = Validate.validate(Device.makeSchema(), device);

      expect(errors.map((e) => e.message)).toEqual([
        `${PRIMARY}: pointed-to value with path ${TARGET} from value 0 is empty set`,
      ]);
    });

    it("should log reference failures to the trace when asked", () => {
      const trace = Trace.make();
      const errors = Validate.validate(Device.makeSchema(), withPrimary(5), { logLeafrefErrors: true, trace });

      expect(errors).toEqual([]);
      expect(trace.flush()).toContain(
        `leafref: ${PRIMARY}: value 5 has leafref path ${TARGET} not equal to any target nodes`
      );
    });

    it("should only check references from the schema root", () => {
      const schema = Device.makeSchema();
      const iface = schema.child("interfaces")?.child("interface");
      const eth0 = withPrimary(5).list("interface")?.get("eth0");

      expect(iface !== undefined && eth0 !== undefined ? Validate.validate(iface, eth0) : undefined).toEqual([]);
    });

    describe("predicates", () => {
      const schema = () =>
        Schema.FakeRoot("device", [
          Schema.Container("interfaces", [
            Schema.List(
              "interface",
              ["name"],
              [
                Schema.Leaf("name", { kind: "string" }),
                Schema.Container("subinterfaces", [
                  Schema.List("subinterface", ["index"], [Schema.Leaf("index", { kind: "uint32" })]),
                ]),
              ]
            ),
          ]),
          Schema.Container("routes", [
            Schema.List(
              "route",
              ["prefix"],
              [
                Schema.Leaf("prefix", { kind: "string" }),
                Schema.Leaf("interface", Schema.leafref("/interfaces/interface/name")),
                Schema.Leaf(
                  "subinterface",
                  Schema.leafref("/interfaces/interface[name=current()/../interface]/subinterfaces/subinterface/index")
                ),
              ]
            ),
          ]),
        ]);

      const Sub = Node.Struct("Sub", { index: Node.Leaf("index", "number") });
      const If = Node.Struct("If", {
        name: Node.Leaf("name"),
        sub: Node.List("subinterfaces/subinterface", () => Sub, ["index"]),
      });
      const Route = Node.Struct("Route", {
        prefix: Node.Leaf("prefix"),
        iface: Node.Leaf("interface"),
        sub: Node.Leaf("subinterface", "number"),
      });
      const Root = Node.Struct("Root", {
        iface: Node.List("interfaces/interface", () => If, ["name"]),
        route: Node.List("routes/route", () => Route, ["prefix"]),
      });

      const tree = (iface: string, sub: number) => {
        const root = Root.create();
        const interfaces = root.getOrCreateList("iface");
        interfaces.getOrCreate("eth0").getOrCreateList("sub").getOrCreate(0);
        interfaces.getOrCreate("eth1").getOrCreateList("sub").getOrCreate(5);
        root.getOrCreateList("route").getOrCreate("10.0.0.0/8").set("iface", iface).set("sub", sub);
        return root;
      };

      it("should resolve current() against the referencing entry", () => {
        expect(Validate.validate(schema(), tree("eth1", 5))).toEqual([]);
      });

      it("should restrict the target to the selected entry", () => {
        const errors = Validate.validate(schema(), tree("eth1", 0));

        expect(errors.map((e) => e.schemaPath)).toEqual(["/device/routes/route/subinterface"]);
      });

      it("should reject a reference to a missing interface", () => {
        const errors = Validate.validate(schema(), tree("eth9", 5));

        expect(errors.map((e) => e.schemaPath)).toEqual([
          "/device/routes/route/interface",
          "/device/routes/route/subinterface",
        ]);
      });
    });
  });

  describe("scalar constraints", () => {
    it("should collect every violation across the tree", () => {
      const device = Device.makeDevice();
      device.list("interface")?.get("eth0")?.set("mtu", 10);
      device.child("system")?.set("hostname", "Router_1");
      const errors = Validate.validate(Device.makeSchema(), device);

      expect(errors.map((e) => [e.kind, e.schemaPath])).toEqual([
        ["range", "/device/interfaces/interface/config/mtu"],
        ["pattern", "/device/system/config/hostname"],
      ]);
    });

    it("should check values resolved through a leafref", () => {
      const device = Device.makeDevice();
      device.list("interface")?.get("eth0")?.set("primarySubinterface", -1);
      const errors = Validate.validate(Device.makeSchema(), device, { ignoreMissingData: true });

      expect(errors.map((e) => [e.kind, e.schemaPath])).toEqual([["range", PRIMARY]]);
    });

    it("should check every element of a leaf-list", () => {
      const schema = Schema.Container("top", [Schema.LeafList("port", { kind: "uint8" })]);
      const Top = Node.Struct("Top", { port: Node.LeafList("port", "number") });
      const errors = Validate.validate(schema, Top.create().set("port", [1, 256, 300]));

      expect(errors.map((e) => e.message)).toEqual([
        "/top/port: 256 is outside the uint8 range",
        "/top/port: 300 is outside the uint8 range",
      ]);
    });
  });

  describe("list keys", () => {
    it("should report a key leaf that disagrees with its map key", () => {
      const device = Device.makeDevice();
      device.list("interface")?.get("eth0")?.set("name", "eth7");
      const errors = Validate.validate(Device.makeSchema(), device);

      expect(errors.map((e) => e.message)).toEqual([
        "/device/interfaces/interface: key field name has value eth7, map key has eth0",
      ]);
    });

    it("should report a generated key that differs from the schema key", () => {
      const BadInterface = Node.Struct("BadInterface", { name: Node.Leaf("config/name|name") });
      const BadDevice = Node.Struct("BadDevice", {
        interface: Node.List("interfaces/interface", () => BadInterface, ["ifname"]),
      });
      const device = BadDevice.create();
      device.getOrCreateList("interface").set("eth0", BadInterface.create().set("name", "eth0"));

      expect(Validate.validate(Device.makeSchema(), device).map((e) => e.message)).toEqual([
        "/device/interfaces/interface: schema declares key (name), generated type uses (ifname)",
      ]);
    });
  });

  it("should report a field without schema", () => {
    const interfaces = Device.makeSchema().child("interfaces");
    const system = Device.System.create().set("hostname", "r1");
    const errors = interfaces === undefined ? [] : Validate.validate(interfaces, system);

    expect(errors.map((e) => [e.kind, e.message])).toEqual([
      ["schema", "/device/interfaces/hostname: no schema for field hostname of System"],
    ]);
  });
});
