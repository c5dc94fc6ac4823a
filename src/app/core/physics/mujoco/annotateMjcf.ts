import { resolveConverterDefaults } from "../../config/converterConfig";
import { logInfo, logWarn } from "../../services/logger";
import { addMimicPlugins, synthesizeActuators } from "./ActuatorSynthesizer";
import type { AnnotateMjcfOptions, AnnotateMjcfResult } from "./annotateMjcfTypes";
import { applyAnnotationFragments } from "./annotations/annotationDispatcher";
import { emptyAnnotationReport } from "./annotations/types";
import { MjcfDocument } from "./MjcfDocument";
import {
  addClockPublisherPlugin,
  addCustomPlugin,
  addDefaultLight,
  addFloor,
  addRos2ControlPlugin,
  applyCompilerAttributes,
  applyDampingMultiplier,
  enableGravityCompensation,
  groupRosUtilsPlugins,
  makeBaseFloating,
  setJointArmature,
  setSimulationOptions,
} from "./mjcfPostprocess";

const SCOPE = "mjcf";

/**
 * Applies the URDF-side annotations and the requested post-processing to a compiled MJCF
 * string. Annotation fragments run last so they can override anything generated before.
 */
export function annotateMjcf(options: AnnotateMjcfOptions): AnnotateMjcfResult {
  const warnings: string[] = [];
  const warn = (message: string) => warnings.push(message);

  const parsed = MjcfDocument.parse(options.mjcf);
  warnings.push(...parsed.warnings);
  const doc = parsed.document;
  if (!doc) {
    for (const message of warnings) logWarn(message, { scope: SCOPE });
    return { xml: "", warnings, report: emptyAnnotationReport(), actuators: null, mimic: null };
  }

  const defaults = resolveConverterDefaults();
  const { annotations } = options;
  const gains = options.actuatorGains ?? defaults.actuatorGains;
  const rosInstance = options.rosInstance ?? defaults.ros2ControlInstance;

  const dampingMultiplier = options.dampingMultiplier ?? 1;
  if (dampingMultiplier !== 1) applyDampingMultiplier(doc, dampingMultiplier);

  for (const plugin of annotations.plugins) addCustomPlugin(doc, plugin, warn);
  applyCompilerAttributes(doc, annotations.compiler, warn);
  if (options.addLight ?? true) addDefaultLight(doc);

  if (options.addClockPublisher) addClockPublisherPlugin(doc, warn);
  if (options.addRos2Control) addRos2ControlPlugin(doc, rosInstance, options.ros2ControlConfig, warn);
  groupRosUtilsPlugins(doc);

  if (options.floatingBase) makeBaseFloating(doc, Math.max(0, options.heightAboveFloor ?? 0));
  if (options.addFloor) addFloor(doc);

  let actuators: AnnotateMjcfResult["actuators"] = null;
  let mimic: AnnotateMjcfResult["mimic"] = null;
  if (options.actuators ?? true) {
    actuators = synthesizeActuators(
      doc,
      {
        jointInterfaces: annotations.jointInterfaces,
        mimicJoints: annotations.mimicJoints,
        gains,
        alwaysSuffix: options.alwaysSuffixActuators ?? defaults.alwaysSuffixActuators,
        addRosPlugins: options.addRosPlugins,
        rosInstance,
      },
      warn
    );
    if ((options.mimicJoints ?? true) && Object.keys(annotations.mimicJoints).length) {
      mimic = addMimicPlugins(doc, annotations.mimicJoints, gains, warn);
    }
    groupRosUtilsPlugins(doc);
  }

  if (options.gravityCompensation) enableGravityCompensation(doc);
  if (options.armature !== undefined) setJointArmature(doc, options.armature);
  setSimulationOptions(doc, { solver: options.solver, integrator: options.integrator });

  const report = applyAnnotationFragments(doc, annotations.fragments, warn);
  groupRosUtilsPlugins(doc);

  for (const message of warnings) logWarn(message, { scope: SCOPE });
  logInfo(
    `Annotated MJCF: ${report.fragments} fragment(s), ${report.created} created, ${report.unmatched} unmatched, ${warnings.length} warning(s).`,
    { scope: SCOPE }
  );
  return { xml: doc.toXml({ declaration: options.declaration ?? true }), warnings, report, actuators, mimic };
}
