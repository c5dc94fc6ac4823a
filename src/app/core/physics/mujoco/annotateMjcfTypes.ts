import type { ActuatorGains } from "../../config/converterConfig";
import type { UrdfAnnotations } from "../../urdf/urdfAnnotations";
import type { ActuatorSynthesisResult, MimicPluginResult } from "./ActuatorSynthesizer";
import type { AnnotationReport } from "./annotations/types";

export type AnnotateMjcfOptions = {
  // MJCF compiled from the preprocessed URDF.
  mjcf: string;
  annotations: UrdfAnnotations;
  dampingMultiplier?: number;
  addLight?: boolean;
  addClockPublisher?: boolean;
  addRos2Control?: boolean;
  ros2ControlConfig?: string;
  floatingBase?: boolean;
  heightAboveFloor?: number;
  addFloor?: boolean;
  actuators?: boolean;
  mimicJoints?: boolean;
  addRosPlugins?: boolean;
  actuatorGains?: ActuatorGains;
  alwaysSuffixActuators?: boolean;
  rosInstance?: string;
  gravityCompensation?: boolean;
  armature?: number;
  solver?: string;
  integrator?: string;
  declaration?: boolean;
};

export type AnnotateMjcfResult = {
  xml: string;
  warnings: string[];
  report: AnnotationReport;
  actuators: ActuatorSynthesisResult | null;
  mimic: MimicPluginResult | null;
};
