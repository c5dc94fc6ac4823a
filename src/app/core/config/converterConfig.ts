export type ActuatorGains = {
  kp: number;
  kv: number;
  dampratio?: number;
};

export type ActuatorGainOverrides = Partial<ActuatorGains>;

export type ConverterDefaults = {
  actuatorGains: ActuatorGains;
  meshDir: string;
  ros2ControlInstance: string;
  alwaysSuffixActuators: boolean;
};

export class ActuatorGainsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ActuatorGainsError";
  }
}

export const DEFAULT_ACTUATOR_GAINS: ActuatorGains = { kp: 500.0, kv: 1.0 };
export const DEFAULT_MESH_DIR = "assets/";
export const DEFAULT_ROS2_CONTROL_INSTANCE = "ros2_control";

/** Compiler attributes written into the URDF <mujoco><compiler> before source values and overrides. */
export const defaultCompilerAttributes = (meshDir: string): Record<string, string> => ({
  meshdir: meshDir,
  balanceinertia: "false",
  discardvisual: "false",
  fusestatic: "false",
  inertiafromgeom: "false",
});

const GAIN_KEYS = ["kp", "kv", "dampratio"] as const;
type GainKey = (typeof GAIN_KEYS)[number];
const isGainKey = (key: string): key is GainKey => GAIN_KEYS.some((candidate) => candidate === key);

/**
 * Accepts `kp=500,kv=1`, `kp=500 kv=1 dampratio=0.5` or the legacy `[kp, kv]` pair.
 * The last occurrence of a key wins.
 */
export function parseActuatorGains(input: string | readonly number[]): ActuatorGainOverrides {
  if (typeof input !== "string") {
    if (input.length !== 2) {
      throw new ActuatorGainsError(`Legacy list format must have exactly 2 values [kp, kv], got ${input.length}.`);
    }
    return { kp: Number(input[0]), kv: Number(input[1]) };
  }

  const tokens = input
    .trim()
    .replace(/\s*=\s*/g, "=")
    .split(/[\s,]+/)
    .filter(Boolean);
  if (!tokens.length) {
    throw new ActuatorGainsError(`No valid key=value pairs found in actuator gains '${input}'.`);
  }

  const gains: ActuatorGainOverrides = {};
  for (const token of tokens) {
    const separator = token.indexOf("=");
    if (separator < 0) {
      throw new ActuatorGainsError(`Invalid format '${token}' in actuator gains. Expected key=value.`);
    }
    const key = token.slice(0, separator);
    const raw = token.slice(separator + 1);
    if (!isGainKey(key)) {
      throw new ActuatorGainsError(`Unknown actuator gain key: '${key}'. Supported keys: ${GAIN_KEYS.join(", ")}.`);
    }
    const value = raw ? Number(raw) : Number.NaN;
    if (!Number.isFinite(value)) {
      throw new ActuatorGainsError(`Invalid value for '${key}': '${raw}'.`);
    }
    gains[key] = value;
  }
  return gains;
}

export const withDefaultGains = (overrides: ActuatorGainOverrides, base: ActuatorGains = DEFAULT_ACTUATOR_GAINS): ActuatorGains => ({
  ...base,
  ...overrides,
});

export function resolveConverterDefaults(env: Record<string, string | undefined> = process.env): ConverterDefaults {
  const gains = env.MJCF_DEFAULT_ACTUATOR_GAINS;
  return {
    actuatorGains: gains ? withDefaultGains(parseActuatorGains(gains)) : { ...DEFAULT_ACTUATOR_GAINS },
    meshDir: env.MJCF_MESH_DIR ?? DEFAULT_MESH_DIR,
    ros2ControlInstance: env.MJCF_ROS2_CONTROL_INSTANCE ?? DEFAULT_ROS2_CONTROL_INSTANCE,
    alwaysSuffixActuators: String(env.MJCF_FORCE_ACTUATOR_SUFFIX ?? "false").toLowerCase() === "true",
  };
}

/** Whole numbers keep one decimal: `500` -> `500.0`. */
export const formatDecimal = (value: number) => (Number.isInteger(value) ? value.toFixed(1) : String(value));
