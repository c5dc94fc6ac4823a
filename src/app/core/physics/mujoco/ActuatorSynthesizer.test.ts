import { describe, expect, it, vi } from "vitest";
import { parseXmlString, serializeXml } from "../../xml/xmlTree";
import {
  ACTUATOR_COMMAND_PLUGIN,
  MIMIC_JOINT_PLUGIN,
  addMimicPlugins,
  planJointActuators,
  synthesizeActuators,
} from "./ActuatorSynthesizer";
import { MjcfDocument } from "./MjcfDocument";

const GAINS = { kp: 500.0, kv: 1.0 };

const mjcf = (source: string) => {
  const { root } = parseXmlString(source);
  if (!root) throw new Error(`fixture did not parse: ${source}`);
  return new MjcfDocument(root);
};

const hipModel = () => mjcf(`<mujoco><worldbody><body name="b"><joint name="hip"/></body></worldbody></mujoco>`);

const requireActuator = (doc: MjcfDocument) => {
  const actuator = doc.actuator;
  if (!actuator) throw new Error("no <actuator> section");
  return actuator;
};

describe("planJointActuators", () => {
  it("moves through the naming states by interface count", () => {
    expect(planJointActuators("hip", new Set(["effort"]))).toEqual({ state: "no-actuator", joint: "hip", actuators: [] });
    expect(planJointActuators("hip", new Set(["velocity"]))).toEqual({
      state: "single-actuator",
      joint: "hip",
      actuators: [{ kind: "velocity", name: "hip" }],
    });
    expect(planJointActuators("hip", new Set(["velocity", "position"]))).toEqual({
      state: "dual-actuator",
      joint: "hip",
      actuators: [
        { kind: "position", name: "hip_position" },
        { kind: "velocity", name: "hip_velocity" },
      ],
    });
  });

  it("suffixes a single actuator when asked to", () => {
    expect(planJointActuators("hip", new Set(["position"]), true).actuators).toEqual([
      { kind: "position", name: "hip_position" },
    ]);
  });
});

describe("synthesizeActuators", () => {
  it("adds a bare-named position actuator after worldbody", () => {
    const doc = hipModel();
    const result = synthesizeActuators(doc, { jointInterfaces: { hip: new Set(["position"]) }, gains: GAINS }, vi.fn());

    expect(doc.root.children.map((child) => child.tag)).toEqual(["worldbody", "actuator"]);
    expect(serializeXml(requireActuator(doc))).toBe(`<actuator>\n  <position name="hip" joint="hip" kp="500.0" />\n</actuator>\n`);
    expect(result).toEqual({ actuators: ["hip"], joints: ["hip"], pluginJoints: [] });
  });

  it("creates both kinds with ranges copied from the joint", () => {
    const doc = mjcf(
      `<mujoco><worldbody><body><joint name="hip" range="-1 1" actuatorfrcrange="-5 5"/></body></worldbody></mujoco>`
    );
    synthesizeActuators(doc, { jointInterfaces: { hip: new Set(["velocity", "position"]) }, gains: GAINS }, vi.fn());

    expect(requireActuator(doc).children).toEqual([
      {
        tag: "position",
        attrs: { name: "hip_position", joint: "hip", kp: "500.0", ctrlrange: "-1 1", forcelimited: "true", forcerange: "-5 5" },
        text: null,
        children: [],
      },
      {
        tag: "velocity",
        attrs: { name: "hip_velocity", joint: "hip", kv: "1.0", ctrlrange: "-1 1", forcelimited: "true", forcerange: "-5 5" },
        text: null,
        children: [],
      },
    ]);
  });

  it("skips free joints, unlisted joints and joints without position or velocity", () => {
    const doc = mjcf(`
      <mujoco><worldbody><body>
        <joint name="root" type="free"/>
        <joint name="knee"/>
        <joint name="wrist"/>
      </body></worldbody></mujoco>
    `);
    const result = synthesizeActuators(
      doc,
      { jointInterfaces: { root: new Set(["position"]), wrist: new Set(["effort"]) }, gains: GAINS },
      vi.fn()
    );
    expect(result.joints).toEqual([]);
    expect(requireActuator(doc).children).toEqual([]);
  });

  it("writes dampratio for position actuators when the gains carry one", () => {
    const doc = hipModel();
    synthesizeActuators(
      doc,
      { jointInterfaces: { hip: new Set(["position"]) }, gains: { kp: 100, kv: 2, dampratio: 0.7 } },
      vi.fn()
    );
    expect(requireActuator(doc).children[0].attrs).toEqual({ name: "hip", joint: "hip", kp: "100.0", dampratio: "0.7" });
  });

  it("adds actuator-command plugins for joints that do not mimic", () => {
    const doc = mjcf(`<mujoco><worldbody><body><joint name="hip"/><joint name="knee"/></body></worldbody></mujoco>`);
    const result = synthesizeActuators(
      doc,
      {
        jointInterfaces: { hip: new Set(["position"]), knee: new Set(["position"]) },
        mimicJoints: { knee: { joint: "hip", multiplier: "1.0", offset: "0.0" } },
        gains: GAINS,
        addRosPlugins: true,
        rosInstance: "hw",
      },
      vi.fn()
    );

    expect(result.pluginJoints).toEqual(["hip"]);
    expect(doc.extension?.children).toEqual([
      {
        tag: "plugin",
        attrs: { plugin: ACTUATOR_COMMAND_PLUGIN },
        text: null,
        children: [{ tag: "instance", attrs: { name: "hw" }, text: null, children: [] }],
      },
    ]);
    expect(requireActuator(doc).children.map((child) => child.tag)).toEqual(["position", "plugin", "position"]);
    expect(requireActuator(doc).children[1].attrs).toEqual({ plugin: ACTUATOR_COMMAND_PLUGIN, joint: "hip", instance: "hw" });
  });

  it("warns when the model has no worldbody", () => {
    const warn = vi.fn();
    synthesizeActuators(mjcf(`<mujoco/>`), { jointInterfaces: { hip: new Set(["position"]) }, gains: GAINS }, warn);
    expect(warn).toHaveBeenCalledWith("No <worldbody> found in the model. Cannot add actuators.");
  });
});

describe("addMimicPlugins", () => {
  it("reuses the existing position actuator and omits a zero offset", () => {
    const doc = hipModel();
    synthesizeActuators(doc, { jointInterfaces: { hip: new Set(["position"]) }, gains: GAINS }, vi.fn());
    const result = addMimicPlugins(doc, { hip: { joint: "base", multiplier: "1.0", offset: "0.0" } }, GAINS, vi.fn());

    expect(result).toEqual({ createdActuators: [], pluginJoints: ["hip"] });
    expect(doc.root.children.map((child) => child.tag)).toEqual(["extension", "worldbody", "actuator"]);
    expect(doc.extension?.children).toEqual([{ tag: "plugin", attrs: { plugin: MIMIC_JOINT_PLUGIN }, text: null, children: [] }]);
    expect(serializeXml(requireActuator(doc))).toBe(
      [
        "<actuator>",
        '  <position name="hip" joint="hip" kp="500.0" />',
        `  <plugin plugin="${MIMIC_JOINT_PLUGIN}" joint="hip">`,
        '    <config key="mimic_joint" value="base" />',
        '    <config key="gear" value="1.0" />',
        "  </plugin>",
        "</actuator>",
        "",
      ].join("\n")
    );
  });

  it("creates a position actuator under a free name and keeps a non-zero offset", () => {
    const doc = mjcf(`
      <mujoco>
        <worldbody><body><joint name="finger" range="0 1"/></body></worldbody>
        <actuator><velocity name="finger" joint="finger"/></actuator>
      </mujoco>
    `);
    const result = addMimicPlugins(doc, { finger: { joint: "thumb", multiplier: "-1", offset: "0.1" } }, GAINS, vi.fn());

    const actuator = requireActuator(doc);
    expect(result.createdActuators).toEqual(["finger"]);
    expect(actuator.children[1].attrs).toEqual({ name: "finger_position", joint: "finger", kp: "500.0", ctrlrange: "0 1" });
    expect(actuator.children[2].children.map((config) => config.attrs)).toEqual([
      { key: "mimic_joint", value: "thumb" },
      { key: "gear", value: "-1" },
      { key: "offset", value: "0.1" },
    ]);
  });

  it("skips followers that are not in the model", () => {
    const warn = vi.fn();
    const doc = hipModel();
    const result = addMimicPlugins(doc, { ghost: { joint: "hip", multiplier: "1.0", offset: "0.0" } }, GAINS, warn);
    expect(result.pluginJoints).toEqual([]);
    expect(warn).toHaveBeenCalledWith("Mimic joint 'ghost' not found in the model. Skipping MimicJoint plugin.");
  });
});
