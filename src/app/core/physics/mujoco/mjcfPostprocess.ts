import { formatDecimal } from "../../config/converterConfig";
import { logDebug, logInfo, type WarningSink } from "../../services/logger";
import {
  appendChild,
  createElement,
  descendants,
  findChild,
  findChildren,
  getAttribute,
  hasAttribute,
  insertChild,
  removeChild,
  type XmlElement,
} from "../../xml/xmlTree";
import type { MjcfDocument } from "./MjcfDocument";

const SCOPE = "mjcf";

export const ROS_UTILS_PREFIX = "MujocoRosUtils::";
export const CLOCK_PUBLISHER_PLUGIN = "MujocoRosUtils::ClockPublisher";
export const ROS2_CONTROL_PLUGIN = "MujocoRosUtils::Ros2Control";

export type SimulationOptions = {
  solver?: string;
  integrator?: string;
};

export function applyDampingMultiplier(doc: MjcfDocument, multiplier: number) {
  let count = 0;
  for (const node of descendants(doc.root)) {
    if (node.tag !== "joint") continue;
    const damping = Number.parseFloat(getAttribute(node, "damping") ?? "");
    if (!Number.isFinite(damping)) continue;
    node.attrs.damping = formatDecimal(damping * multiplier);
    count += 1;
  }
  logInfo(`Multiplied joint damping by a factor of ${multiplier} on ${count} joint(s).`, { scope: SCOPE });
}

/** Copies the compiler attributes captured from the URDF onto the MJCF <compiler>, first child. */
export function applyCompilerAttributes(doc: MjcfDocument, compiler: XmlElement | null, warn: WarningSink) {
  if (!compiler) {
    warn("No <compiler> tag found to apply post-processing to.");
    return;
  }
  const target = doc.compiler ?? insertChild(doc.root, 0, createElement("compiler"));
  Object.assign(target.attrs, compiler.attrs);
  logInfo("Applied compiler attributes.", { scope: SCOPE, data: { ...compiler.attrs } });
}

/**
 * Resolves `${env:VAR}` references and strips a `file://` prefix. ROS package lookups
 * (`package://`, `$(find ...)`) cannot be resolved and yield null.
 */
export function resolvePluginValue(
  raw: string,
  warn: WarningSink,
  env: Record<string, string | undefined> = process.env
): string | null {
  if (!raw) return null;
  const value = raw.replace(/\$\{env:([^}]+)\}/g, (match, name: string) => {
    const resolved = env[name];
    if (resolved === undefined) {
      warn(`Environment variable '${name}' not found.`);
      return match;
    }
    return resolved;
  });
  if (value.startsWith("package://") || value.includes("$(find")) return null;
  return value.startsWith("file://") ? value.slice("file://".length) : value;
}

/** URDF `<plugin filename name><param>value</param></plugin>` -> MJCF extension plugin with config entries. */
export function addCustomPlugin(doc: MjcfDocument, urdfPlugin: XmlElement, warn: WarningSink) {
  const pluginName = getAttribute(urdfPlugin, "filename");
  if (!pluginName) {
    warn("Skipping custom <plugin> tag with no 'filename' attribute.");
    return;
  }
  const instanceName = getAttribute(urdfPlugin, "name") ?? pluginName;

  const plugin = appendChild(doc.ensureExtension(), createElement("plugin", { plugin: pluginName }));
  const instance = appendChild(plugin, createElement("instance", { name: instanceName }));

  let params = 0;
  for (const param of urdfPlugin.children) {
    const raw = (param.text ?? "").trim();
    const value = resolvePluginValue(raw, warn);
    if (!value) {
      warn(`Could not resolve path for plugin parameter '${param.tag}': ${raw}. Skipping this parameter.`);
      continue;
    }
    appendChild(instance, createElement("config", { key: param.tag, value }));
    params += 1;
  }
  logInfo(`Added custom plugin '${pluginName}'${params ? ` with ${params} parameter(s)` : ""}.`, { scope: SCOPE });
}

export function addDefaultLight(doc: MjcfDocument) {
  const worldbody = doc.worldbody;
  if (!worldbody) return;
  appendChild(worldbody, createElement("light", { diffuse: ".8 .8 .8", pos: "0 0 5", dir: "0 0 -1" }));
  logInfo("Added a default light to the model.", { scope: SCOPE });
}

export function addFloor(doc: MjcfDocument) {
  const exists = descendants(doc.root).some((node) => node.tag === "geom" && getAttribute(node, "name") === "floor");
  if (exists) {
    logInfo("Floor plane already exists in the model; skipping addition.", { scope: SCOPE });
    return;
  }
  const asset = doc.ensureBeforeWorldbody("asset");
  appendChild(
    asset,
    createElement("texture", {
      name: "floor",
      type: "2d",
      builtin: "checker",
      rgb1: "0.1 0.2 0.3",
      rgb2: "0.2 0.3 0.4",
      width: "300",
      height: "300",
      mark: "edge",
      markrgb: "0.2 0.3 0.4",
    })
  );
  appendChild(asset, createElement("material", { name: "floor", texture: "floor", texrepeat: "10 10", texuniform: "true" }));
  const worldbody = doc.worldbody;
  if (worldbody) {
    appendChild(worldbody, createElement("geom", { name: "floor", type: "plane", size: "20 20 0.1", material: "floor" }));
  }
  logInfo("Added a floor plane to the model.", { scope: SCOPE });
}

export function addClockPublisherPlugin(doc: MjcfDocument, warn: WarningSink) {
  appendChild(doc.ensureExtension(), createElement("plugin", { plugin: CLOCK_PUBLISHER_PLUGIN }));
  const worldbody = doc.worldbody;
  if (!worldbody) {
    warn("No <worldbody> found in the model. Cannot add clock publisher plugin.");
    return;
  }
  appendChild(
    worldbody,
    createElement("plugin", { plugin: CLOCK_PUBLISHER_PLUGIN }, [
      createElement("config", { key: "topic_name", value: "/clock" }),
      createElement("config", { key: "publish_rate", value: "100" }),
      createElement("config", { key: "use_sim_time", value: "true" }),
    ])
  );
  logInfo(`Added '${CLOCK_PUBLISHER_PLUGIN}' plugin to the model.`, { scope: SCOPE });
}

export function addRos2ControlPlugin(doc: MjcfDocument, instanceName: string, configFile: string | undefined, warn: WarningSink) {
  const plugin = appendChild(doc.ensureExtension(), createElement("plugin", { plugin: ROS2_CONTROL_PLUGIN }));
  const instance = appendChild(plugin, createElement("instance", { name: instanceName }));
  if (configFile) {
    appendChild(instance, createElement("config", { key: "config_file", value: configFile }));
  } else {
    warn("Adding ROS2 control WITHOUT a config file! Ros2Control plugin will use its default config file.");
  }
  if (!doc.worldbody) {
    warn("No <worldbody> found in the model. Cannot add Ros2Control plugin.");
    return;
  }
  logInfo(`Added '${ROS2_CONTROL_PLUGIN}' plugin to the model.`, { scope: SCOPE });
}

/** Moves every MujocoRosUtils extension plugin to the end of <extension>, keeping their order. */
export function groupRosUtilsPlugins(doc: MjcfDocument) {
  const extension = doc.extension;
  if (!extension) return;
  const plugins = findChildren(extension, "plugin").filter((node) =>
    (getAttribute(node, "plugin") ?? "").startsWith(ROS_UTILS_PREFIX)
  );
  for (const plugin of plugins) removeChild(extension, plugin);
  for (const plugin of plugins) appendChild(extension, plugin);
}

export function makeBaseFloating(doc: MjcfDocument, heightAboveGround = 0) {
  const worldbody = doc.worldbody;
  const base = worldbody ? findChild(worldbody, "body") : null;
  if (!base) return;
  const hasFreeJoint = findChildren(base, "joint").some((joint) => getAttribute(joint, "type") === "free");
  if (!hasFreeJoint) {
    appendChild(base, createElement("joint", { name: "root", type: "free" }));
    logInfo(`Made the base link '${getAttribute(base, "name") ?? ""}' floating with a free joint.`, { scope: SCOPE });
  }
  if (!hasAttribute(base, "pos")) {
    base.attrs.pos = `0 0 ${formatDecimal(heightAboveGround)}`;
  }
}

export function enableGravityCompensation(doc: MjcfDocument) {
  const worldbody = doc.worldbody;
  if (!worldbody) return;
  const bodies = descendants(worldbody).filter((node) => node.tag === "body");
  for (const body of bodies) body.attrs.gravcomp = "1";
  logInfo(`Enabled gravity compensation for ${bodies.length} bodies.`, { scope: SCOPE });
}

export function setJointArmature(doc: MjcfDocument, armature: number) {
  const worldbody = doc.worldbody;
  if (!worldbody) return;
  const joints = descendants(worldbody).filter((node) => node.tag === "joint");
  const value = formatDecimal(armature);
  for (const joint of joints) joint.attrs.armature = value;
  logInfo(`Set armature to '${value}' for ${joints.length} joints.`, { scope: SCOPE });
}

export function setSimulationOptions(doc: MjcfDocument, options: SimulationOptions) {
  const { solver, integrator } = options;
  if (!solver && !integrator) return;
  const option = doc.ensureAfter("option", "compiler");
  const applied: string[] = [];
  if (solver) {
    option.attrs.solver = solver;
    applied.push(`solver='${solver}'`);
  }
  if (integrator) {
    option.attrs.integrator = integrator;
    applied.push(`integrator='${integrator}'`);
  }
  logDebug(`Set simulation options: ${applied.join(", ")}`, { scope: SCOPE });
}
