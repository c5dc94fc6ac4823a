export * from "./app/core/xml/xmlTree";
export { MjcfDocument, type MjcfParseResult, type MjcfSection } from "./app/core/physics/mujoco/MjcfDocument";
export * from "./app/core/physics/mujoco/annotations/types";
export { findExactMatches, findMatchingElements, matchesPattern, globToRegExp } from "./app/core/physics/mujoco/annotations/patternMatcher";
export { mergeFragments, elementsEquivalent } from "./app/core/physics/mujoco/annotations/fragmentMerger";
export {
  parseOperations,
  parseConditionalReplacement,
  tokenizeAssignments,
  RESERVED_OPERATION_ATTRIBUTES,
} from "./app/core/physics/mujoco/annotations/operationParser";
export { applyOperation, applyOperations, injectChildren } from "./app/core/physics/mujoco/annotations/operationApplier";
export { applyAnnotationFragments, planFragment } from "./app/core/physics/mujoco/annotations/annotationDispatcher";
export * from "./app/core/physics/mujoco/ActuatorSynthesizer";
export * from "./app/core/physics/mujoco/mjcfPostprocess";
export { annotateMjcf } from "./app/core/physics/mujoco/annotateMjcf";
export type { AnnotateMjcfOptions, AnnotateMjcfResult } from "./app/core/physics/mujoco/annotateMjcfTypes";
export * from "./app/core/urdf/urdfAnnotations";
export { zeroInertialOrientation, evaluateAngle } from "./app/core/urdf/urdfInertial";
export * from "./app/core/config/converterConfig";
export { addLogSink, logDebug, logError, logInfo, logWarn, type LogSink, type WarningSink } from "./app/core/services/logger";
export { consoleStore, visibleEntries, type LogEntry, type LogLevel } from "./app/core/store/consoleStore";
