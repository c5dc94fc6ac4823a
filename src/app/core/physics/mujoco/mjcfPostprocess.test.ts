import { describe, expect, it, vi } from "vitest";
import { createElement, descendants, parseXmlString, type XmlElement } from "../../xml/xmlTree";
import { MjcfDocument } from "./MjcfDocument";
import {
  addClockPublisherPlugin,
  addCustomPlugin,
  addFloor,
  addRos2ControlPlugin,
  applyCompilerAttributes,
  applyDampingMultiplier,
  enableGravityCompensation,
  groupRosUtilsPlugins,
  makeBaseFloating,
  resolvePluginValue,
  setJointArmature,
  setSimulationOptions,
} from "./mjcfPostprocess";

const xml = (source: string): XmlElement => {
  const { root } = parseXmlString(source);
  if (!root) throw new Error(`fixture did not parse: ${source}`);
  return root;
};

const model = () =>
  new MjcfDocument(
    xml(`
      <mujoco>
        <compiler angle="radian"/>
        <worldbody>
          <body name="base">
            <joint name="hip" damping="0.5"/>
            <body name="leg"><joint name="knee"/></body>
          </body>
        </worldbody>
      </mujoco>
    `)
  );

const topLevelTags = (doc: MjcfDocument) => doc.root.children.map((child) => child.tag);
const elements = (doc: MjcfDocument, tag: string) => descendants(doc.root).filter((node) => node.tag === tag);

describe("joint and body attributes", () => {
  it("scales existing joint damping", () => {
    const doc = model();
    applyDampingMultiplier(doc, 2);
    expect(elements(doc, "joint").map((joint) => joint.attrs.damping)).toEqual(["1.0", undefined]);
  });

  it("sets armature on every joint", () => {
    const doc = model();
    setJointArmature(doc, 0.01);
    expect(elements(doc, "joint").map((joint) => joint.attrs.armature)).toEqual(["0.01", "0.01"]);
  });

  it("enables gravity compensation on every body", () => {
    const doc = model();
    enableGravityCompensation(doc);
    expect(elements(doc, "body").map((body) => body.attrs.gravcomp)).toEqual(["1", "1"]);
  });

  it("adds a free joint and a default position to the base body", () => {
    const doc = model();
    makeBaseFloating(doc, 0.5);
    makeBaseFloating(doc, 0.5);
    const base = elements(doc, "body")[0];
    expect(base.attrs.pos).toBe("0 0 0.5");
    expect(base.children.filter((child) => child.attrs.type === "free")).toHaveLength(1);
  });
});

describe("sections", () => {
  it("copies URDF compiler attributes or warns without them", () => {
    const doc = model();
    const warn = vi.fn();
    applyCompilerAttributes(doc, createElement("compiler", { meshdir: "assets/", angle: "degree" }), warn);
    expect(doc.compiler?.attrs).toEqual({ angle: "degree", meshdir: "assets/" });

    applyCompilerAttributes(doc, null, warn);
    expect(warn).toHaveBeenCalledWith("No <compiler> tag found to apply post-processing to.");
  });

  it("places simulation options after the compiler", () => {
    const doc = model();
    setSimulationOptions(doc, {});
    expect(doc.option).toBeNull();
    setSimulationOptions(doc, { solver: "Newton", integrator: "implicitfast" });
    expect(topLevelTags(doc)).toEqual(["compiler", "option", "worldbody"]);
    expect(doc.option?.attrs).toEqual({ solver: "Newton", integrator: "implicitfast" });
  });

  it("adds the floor once", () => {
    const doc = model();
    addFloor(doc);
    addFloor(doc);
    expect(topLevelTags(doc)).toEqual(["compiler", "asset", "worldbody"]);
    expect(doc.asset?.children.map((child) => child.tag)).toEqual(["texture", "material"]);
    expect(elements(doc, "geom").map((geom) => geom.attrs)).toEqual([
      { name: "floor", type: "plane", size: "20 20 0.1", material: "floor" },
    ]);
  });
});

describe("plugins", () => {
  it("resolves environment references and rejects package lookups", () => {
    const warn = vi.fn();
    expect(resolvePluginValue("${env:CFG_DIR}/ctrl.yaml", warn, { CFG_DIR: "/opt/cfg" })).toBe("/opt/cfg/ctrl.yaml");
    expect(resolvePluginValue("file:///tmp/a.yaml", warn, {})).toBe("/tmp/a.yaml");
    expect(resolvePluginValue("package://robot/config.yaml", warn, {})).toBeNull();
    expect(resolvePluginValue("${env:MISSING}", warn, {})).toBe("${env:MISSING}");
    expect(warn).toHaveBeenCalledWith("Environment variable 'MISSING' not found.");
  });

  it("turns a URDF plugin into an extension plugin with config entries", () => {
    const doc = model();
    const warn = vi.fn();
    addCustomPlugin(
      doc,
      xml(`<plugin filename="libsensor.so" name="imu"><rate> 100 </rate><config>package://robot/imu.yaml</config></plugin>`),
      warn
    );

    expect(topLevelTags(doc)).toEqual(["compiler", "extension", "worldbody"]);
    expect(doc.extension?.children).toEqual([
      {
        tag: "plugin",
        attrs: { plugin: "libsensor.so" },
        text: null,
        children: [
          {
            tag: "instance",
            attrs: { name: "imu" },
            text: null,
            children: [{ tag: "config", attrs: { key: "rate", value: "100" }, text: null, children: [] }],
          },
        ],
      },
    ]);
    expect(warn).toHaveBeenCalledWith(
      "Could not resolve path for plugin parameter 'config': package://robot/imu.yaml. Skipping this parameter."
    );
  });

  it("skips a URDF plugin without filename", () => {
    const doc = model();
    const warn = vi.fn();
    addCustomPlugin(doc, createElement("plugin", { name: "x" }), warn);
    expect(doc.extension).toBeNull();
    expect(warn).toHaveBeenCalledWith("Skipping custom <plugin> tag with no 'filename' attribute.");
  });

  it("adds the clock publisher to extension and worldbody", () => {
    const doc = model();
    addClockPublisherPlugin(doc, vi.fn());
    const worldPlugin = doc.worldbody?.children.find((child) => child.tag === "plugin");
    expect(doc.extension?.children.map((child) => child.attrs.plugin)).toEqual(["MujocoRosUtils::ClockPublisher"]);
    expect(worldPlugin?.children.map((child) => child.attrs)).toEqual([
      { key: "topic_name", value: "/clock" },
      { key: "publish_rate", value: "100" },
      { key: "use_sim_time", value: "true" },
    ]);
  });

  it("adds ros2_control with an optional config file", () => {
    const doc = model();
    const warn = vi.fn();
    addRos2ControlPlugin(doc, "hw", "/opt/ctrl.yaml", warn);
    expect(warn).not.toHaveBeenCalled();
    expect(doc.extension?.children[0].children[0]).toEqual({
      tag: "instance",
      attrs: { name: "hw" },
      text: null,
      children: [{ tag: "config", attrs: { key: "config_file", value: "/opt/ctrl.yaml" }, text: null, children: [] }],
    });

    addRos2ControlPlugin(doc, "hw", undefined, warn);
    expect(warn).toHaveBeenCalledWith(
      "Adding ROS2 control WITHOUT a config file! Ros2Control plugin will use its default config file."
    );
  });

  it("moves MujocoRosUtils plugins behind the others", () => {
    const doc = new MjcfDocument(
      xml(`
        <mujoco>
          <extension>
            <plugin plugin="MujocoRosUtils::ClockPublisher"/>
            <plugin plugin="libsensor.so"/>
            <plugin plugin="MujocoRosUtils::MimicJoint"/>
          </extension>
        </mujoco>
      `)
    );
    groupRosUtilsPlugins(doc);
    expect(doc.extension?.children.map((child) => child.attrs.plugin)).toEqual([
      "libsensor.so",
      "MujocoRosUtils::ClockPublisher",
      "MujocoRosUtils::MimicJoint",
    ]);
  });
});
