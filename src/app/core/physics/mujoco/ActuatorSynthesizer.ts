import { formatDecimal, type ActuatorGains } from "../../config/converterConfig";
import { logDebug, logInfo, warnSink, type WarningSink } from "../../services/logger";
import {
  appendChild,
  createElement,
  descendants,
  getAttribute,
  type XmlAttributes,
  type XmlElement,
} from "../../xml/xmlTree";
import type { MjcfDocument } from "./MjcfDocument";
import { NameRegistry } from "./mjcfNames";

const SCOPE = "actuators";

export const ACTUATOR_COMMAND_PLUGIN = "MujocoRosUtils::ActuatorCommand";
export const MIMIC_JOINT_PLUGIN = "MujocoRosUtils::MimicJoint";

export type ActuatorKind = "position" | "velocity";

/** Joint name -> command interfaces declared for it (position, velocity, effort, ...). */
export type JointInterfaceMap = Record<string, ReadonlySet<string>>;

export type MimicRelation = {
  joint: string;
  multiplier: string;
  offset: string;
};

export type MimicJointMap = Record<string, MimicRelation>;

export type ActuatorSynthesisOptions = {
  jointInterfaces: JointInterfaceMap;
  mimicJoints?: MimicJointMap;
  gains: ActuatorGains;
  alwaysSuffix?: boolean;
  addRosPlugins?: boolean;
  rosInstance?: string;
};

export type PlannedActuator = { kind: ActuatorKind; name: string };

export type JointActuatorPlan =
  | { state: "no-actuator"; joint: string; actuators: [] }
  | { state: "single-actuator"; joint: string; actuators: [PlannedActuator] }
  | { state: "dual-actuator"; joint: string; actuators: [PlannedActuator, PlannedActuator] };

export type ActuatorSynthesisResult = {
  actuators: string[];
  joints: string[];
  pluginJoints: string[];
};

export type MimicPluginResult = {
  createdActuators: string[];
  pluginJoints: string[];
};

const ACTUATOR_KINDS: readonly ActuatorKind[] = ["position", "velocity"];

/** Which actuators one joint gets from its interfaces. Unknown interfaces are ignored. */
export function planJointActuators(
  joint: string,
  interfaces: ReadonlySet<string>,
  alwaysSuffix = false
): JointActuatorPlan {
  const kinds = ACTUATOR_KINDS.filter((kind) => interfaces.has(kind));
  const suffix = kinds.length > 1 || alwaysSuffix;
  const nameFor = (kind: ActuatorKind) => (suffix ? `${joint}_${kind}` : joint);

  const [first, second] = kinds;
  if (first && second) {
    return {
      state: "dual-actuator",
      joint,
      actuators: [
        { kind: first, name: nameFor(first) },
        { kind: second, name: nameFor(second) },
      ],
    };
  }
  if (first) {
    return { state: "single-actuator", joint, actuators: [{ kind: first, name: nameFor(first) }] };
  }
  return { state: "no-actuator", joint, actuators: [] };
}

function actuatorAttributes(name: string, joint: XmlElement, jointName: string, kind: ActuatorKind, gains: ActuatorGains) {
  const attrs: XmlAttributes = { name, joint: jointName };
  if (kind === "position") {
    attrs.kp = formatDecimal(gains.kp);
    if (gains.dampratio !== undefined) attrs.dampratio = formatDecimal(gains.dampratio);
  } else {
    attrs.kv = formatDecimal(gains.kv);
  }
  const range = getAttribute(joint, "range");
  if (range !== undefined) attrs.ctrlrange = range;
  const forceRange = getAttribute(joint, "actuatorfrcrange");
  if (forceRange !== undefined) {
    attrs.forcelimited = "true";
    attrs.forcerange = forceRange;
  }
  return attrs;
}

function ensureExtensionPlugin(doc: MjcfDocument, plugin: string, instance?: string) {
  const extension = doc.ensureExtension();
  const declared = extension.children.some((child) => child.tag === "plugin" && getAttribute(child, "plugin") === plugin);
  if (declared) return;
  const node = appendChild(extension, createElement("plugin", { plugin }));
  if (instance !== undefined) appendChild(node, createElement("instance", { name: instance }));
  logInfo(`Added '${plugin}' extension plugin.`, { scope: SCOPE });
}

/**
 * Adds position/velocity actuators for every non-free joint listed in the interface map.
 * Joints missing from the map are left alone.
 */
export function synthesizeActuators(
  doc: MjcfDocument,
  options: ActuatorSynthesisOptions,
  warn: WarningSink = warnSink(SCOPE)
): ActuatorSynthesisResult {
  const result: ActuatorSynthesisResult = { actuators: [], joints: [], pluginJoints: [] };
  const worldbody = doc.worldbody;
  if (!worldbody) {
    warn("No <worldbody> found in the model. Cannot add actuators.");
    return result;
  }
  const { jointInterfaces } = options;
  if (!Object.keys(jointInterfaces).length) {
    logInfo("No ros2_control joints found; skipping actuator generation.", { scope: SCOPE });
    return result;
  }

  const joints = descendants(worldbody).filter((node) => {
    if (node.tag !== "joint" || getAttribute(node, "type") === "free") return false;
    const name = getAttribute(node, "name");
    return name !== undefined && Object.hasOwn(jointInterfaces, name);
  });
  if (!joints.length) {
    logInfo("No actuatable joints found to create actuators for.", { scope: SCOPE });
    return result;
  }

  const actuatorSection = doc.ensureActuatorSection();
  const rosInstance = options.rosInstance ?? "ros2_control";
  if (options.addRosPlugins) ensureExtensionPlugin(doc, ACTUATOR_COMMAND_PLUGIN, rosInstance);

  for (const joint of joints) {
    const jointName = getAttribute(joint, "name");
    const interfaces = jointName !== undefined ? jointInterfaces[jointName] : undefined;
    if (!jointName || !interfaces) continue;

    const plan = planJointActuators(jointName, interfaces, options.alwaysSuffix);
    if (plan.state === "no-actuator") continue;

    for (const { kind, name } of plan.actuators) {
      appendChild(actuatorSection, createElement(kind, actuatorAttributes(name, joint, jointName, kind, options.gains)));
      result.actuators.push(name);
      logDebug(`Added '${kind}' actuator for joint: ${jointName}`, { scope: SCOPE });
    }
    result.joints.push(jointName);

    const isMimic = options.mimicJoints !== undefined && Object.hasOwn(options.mimicJoints, jointName);
    if (options.addRosPlugins && !isMimic) {
      appendChild(
        actuatorSection,
        createElement("plugin", { plugin: ACTUATOR_COMMAND_PLUGIN, joint: jointName, instance: rosInstance })
      );
      result.pluginJoints.push(jointName);
    }
  }

  if (result.joints.length) {
    logInfo(`Added actuators for joints: ${result.joints.join(", ")}`, { scope: SCOPE });
  }
  if (result.pluginJoints.length) {
    logInfo(`Added ROS plugin actuators for joints: ${result.pluginJoints.join(", ")}`, { scope: SCOPE });
  }
  return result;
}

/**
 * Couples each follower joint to its leader through a MimicJoint plugin. A follower
 * without a position actuator gets one first.
 */
export function addMimicPlugins(
  doc: MjcfDocument,
  mimicJoints: MimicJointMap,
  gains: ActuatorGains,
  warn: WarningSink = warnSink(SCOPE)
): MimicPluginResult {
  const result: MimicPluginResult = { createdActuators: [], pluginJoints: [] };
  const entries = Object.entries(mimicJoints);
  if (!entries.length) return result;

  const jointsByName = new Map<string, XmlElement>();
  for (const node of descendants(doc.root)) {
    const name = node.tag === "joint" ? getAttribute(node, "name") : undefined;
    if (name !== undefined && !jointsByName.has(name)) jointsByName.set(name, node);
  }

  ensureExtensionPlugin(doc, MIMIC_JOINT_PLUGIN);
  const actuatorSection = doc.ensureActuatorSection();
  const names = new NameRegistry(
    actuatorSection.children.map((child) => getAttribute(child, "name") ?? ""),
    warn,
    "actuator name"
  );

  for (const [jointName, relation] of entries) {
    const joint = jointsByName.get(jointName);
    if (!joint) {
      warn(`Mimic joint '${jointName}' not found in the model. Skipping MimicJoint plugin.`);
      continue;
    }

    const hasPosition = actuatorSection.children.some(
      (child) => child.tag === "position" && getAttribute(child, "joint") === jointName
    );
    if (!hasPosition) {
      const name = names.claim(jointName, `${jointName}_position`);
      const attrs = actuatorAttributes(name, joint, jointName, "position", gains);
      appendChild(actuatorSection, createElement("position", attrs));
      result.createdActuators.push(jointName);
      logDebug(`Added 'position' actuator for mimic joint: '${jointName}'.`, { scope: SCOPE });
    }

    const plugin = appendChild(actuatorSection, createElement("plugin", { plugin: MIMIC_JOINT_PLUGIN, joint: jointName }));
    appendChild(plugin, createElement("config", { key: "mimic_joint", value: relation.joint }));
    appendChild(plugin, createElement("config", { key: "gear", value: relation.multiplier }));
    const offset = Number.parseFloat(relation.offset);
    if (Number.isFinite(offset) && offset !== 0) {
      appendChild(plugin, createElement("config", { key: "offset", value: relation.offset }));
    }
    result.pluginJoints.push(jointName);
  }

  if (result.createdActuators.length) {
    logInfo(`Created missing position actuators for mimic joints: ${result.createdActuators.join(", ")}`, {
      scope: SCOPE,
    });
  }
  if (result.pluginJoints.length) {
    logInfo(`Added ROS mimic joint plugins for joints: ${result.pluginJoints.join(", ")}`, { scope: SCOPE });
  }
  return result;
}
