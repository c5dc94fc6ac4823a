import { DEFAULT_MESH_DIR, defaultCompilerAttributes } from "../config/converterConfig";
import { logInfo, logWarn, type WarningSink } from "../services/logger";
import type { JointInterfaceMap, MimicJointMap } from "../physics/mujoco/ActuatorSynthesizer";
import { mergeFragments } from "../physics/mujoco/annotations/fragmentMerger";
import {
  appendChild,
  createElement,
  descendants,
  findChild,
  findChildren,
  getAttribute,
  insertChild,
  parseXmlString,
  removeChild,
  serializeXml,
  type XmlElement,
} from "../xml/xmlTree";
import { zeroInertialOrientation } from "./urdfInertial";

const SCOPE = "urdf";

export type UrdfAnnotationOptions = {
  meshDir?: string;
  // KEY=VALUE entries applied last to the compiler attributes.
  compilerOptions?: readonly string[];
};

export type UrdfPreprocessOptions = UrdfAnnotationOptions & {
  zeroInertialRpy?: boolean;
};

export type UrdfAnnotations = {
  compiler: XmlElement;
  fragments: XmlElement[];
  plugins: XmlElement[];
  mimicJoints: MimicJointMap;
  jointInterfaces: JointInterfaceMap;
};

export type UrdfPreprocessResult = {
  urdf: string | null;
  annotations: UrdfAnnotations | null;
  transformedInertials: number;
  warnings: string[];
};

function mergeMujocoBlocks(robot: XmlElement, warn: WarningSink): XmlElement {
  const blocks = findChildren(robot, "mujoco");
  const merged = mergeFragments(blocks);
  for (const block of blocks) removeChild(robot, block);
  if (merged) {
    if (blocks.length > 1) logInfo(`Found ${blocks.length} <mujoco> tags in URDF. Merged them.`, { scope: SCOPE });
    return insertChild(robot, 0, merged);
  }
  warn("No <mujoco> tag found in URDF. Creating one.");
  return insertChild(robot, 0, createElement("mujoco"));
}

function resolveCompilerAttributes(compiler: XmlElement, options: UrdfAnnotationOptions, warn: WarningSink) {
  const attrs = { ...defaultCompilerAttributes(options.meshDir ?? DEFAULT_MESH_DIR), ...compiler.attrs };
  for (const option of options.compilerOptions ?? []) {
    const separator = option.indexOf("=");
    if (separator < 0) {
      warn(`Malformed compiler option '${option}'. Should be in KEY=VALUE format. Skipping.`);
      continue;
    }
    attrs[option.slice(0, separator)] = option.slice(separator + 1);
  }
  compiler.attrs = attrs;
}

export function collectMimicJoints(robot: XmlElement): MimicJointMap {
  const mimicJoints: MimicJointMap = {};
  for (const joint of descendants(robot)) {
    if (joint.tag !== "joint") continue;
    const mimic = findChild(joint, "mimic");
    const name = getAttribute(joint, "name");
    const leader = mimic ? getAttribute(mimic, "joint") : undefined;
    if (!mimic || !name || !leader) continue;
    mimicJoints[name] = {
      joint: leader,
      multiplier: getAttribute(mimic, "multiplier") ?? "1.0",
      offset: getAttribute(mimic, "offset") ?? "0.0",
    };
  }
  return mimicJoints;
}

/** Joint -> command interfaces, from every `<ros2_control>` block. Joints without interfaces are left out. */
export function collectJointInterfaces(robot: XmlElement): JointInterfaceMap {
  const map: Record<string, Set<string>> = {};
  for (const block of descendants(robot)) {
    if (block.tag !== "ros2_control") continue;
    for (const joint of findChildren(block, "joint")) {
      const name = getAttribute(joint, "name");
      if (!name) continue;
      const interfaces = new Set<string>();
      for (const command of findChildren(joint, "command_interface")) {
        const iface = getAttribute(command, "name") || (command.text ?? "").trim();
        if (iface) interfaces.add(iface);
      }
      if (interfaces.size) map[name] = interfaces;
    }
  }
  return map;
}

/**
 * Pulls the MuJoCo-specific content out of a parsed `<robot>`: all top-level `<mujoco>` blocks
 * are merged into one at index 0 that keeps only the resolved `<compiler>`; its other children
 * are returned as plugins and annotation fragments.
 */
export function extractUrdfAnnotations(robot: XmlElement, options: UrdfAnnotationOptions, warn: WarningSink): UrdfAnnotations {
  const mujoco = mergeMujocoBlocks(robot, warn);
  const compiler = findChild(mujoco, "compiler") ?? appendChild(mujoco, createElement("compiler"));

  const extracted = mujoco.children.filter((child) => child !== compiler);
  mujoco.children = [compiler];
  const plugins = extracted.filter((child) => child.tag === "plugin");
  const fragments = extracted.filter((child) => child.tag !== "plugin");
  if (fragments.length) {
    logInfo(
      `Found ${fragments.length} custom MuJoCo elements to inject: ${fragments.map((f) => f.tag).join(", ")}`,
      { scope: SCOPE }
    );
  }

  resolveCompilerAttributes(compiler, options, warn);

  const mimicJoints = collectMimicJoints(robot);
  if (Object.keys(mimicJoints).length) {
    logInfo(`Found mimic joints: ${Object.keys(mimicJoints).join(", ")}`, { scope: SCOPE });
  }
  const jointInterfaces = collectJointInterfaces(robot);
  for (const [joint, interfaces] of Object.entries(jointInterfaces)) {
    logInfo(`Joint '${joint}' has command interfaces: ${[...interfaces].join(", ")}`, { scope: SCOPE });
  }

  return { compiler, fragments, plugins, mimicJoints, jointInterfaces };
}

export function preprocessUrdf(urdf: string, options: UrdfPreprocessOptions = {}): UrdfPreprocessResult {
  const warnings: string[] = [];
  const warn = (message: string) => {
    warnings.push(message);
    logWarn(message, { scope: SCOPE });
  };

  const parsed = parseXmlString(urdf);
  warnings.push(...parsed.warnings);
  const robot = parsed.root;
  if (!robot) {
    return { urdf: null, annotations: null, transformedInertials: 0, warnings };
  }
  if (robot.tag !== "robot") warn(`Expected <robot> root element, found <${robot.tag}>.`);

  let transformedInertials = 0;
  if (options.zeroInertialRpy ?? true) {
    for (const link of descendants(robot)) {
      if (link.tag === "link" && zeroInertialOrientation(link, warn)) transformedInertials += 1;
    }
    if (transformedInertials) {
      logInfo(`Transformed ${transformedInertials} inertial orientation(s) to zero RPY`, { scope: SCOPE });
    }
  }

  const annotations = extractUrdfAnnotations(robot, options, warn);
  return { urdf: serializeXml(robot, { declaration: true }), annotations, transformedInertials, warnings };
}
