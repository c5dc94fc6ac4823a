import * as THREE from "three";
import { logDebug, type WarningSink } from "../services/logger";
import { findChild, getAttribute, type XmlElement } from "../xml/xmlTree";

const RPY_EPSILON = 1e-9;
const INERTIA_KEYS = ["ixx", "ixy", "ixz", "iyy", "iyz", "izz"] as const;

/**
 * Evaluates an rpy component: plain numbers, `pi`, `+ - * /`, parentheses, optionally
 * wrapped in `${...}`. Returns null for anything else.
 */
export function evaluateAngle(raw: string): number | null {
  const source = raw.trim().replace(/^\$\{(.*)\}$/, "$1");
  const tokens = source.match(/\d+\.?\d*(?:[eE][+-]?\d+)?|\.\d+(?:[eE][+-]?\d+)?|pi|[-+*/()]|\S/g) ?? [];
  let pos = 0;

  const peek = () => tokens[pos];
  const next = () => tokens[pos++];

  const primary = (): number | null => {
    const token = next();
    if (token === undefined) return null;
    if (token === "pi") return Math.PI;
    if (token === "-" || token === "+") {
      const value = primary();
      if (value === null) return null;
      return token === "-" ? -value : value;
    }
    if (token === "(") {
      const value = sum();
      return next() === ")" ? value : null;
    }
    const value = Number(token);
    return Number.isFinite(value) ? value : null;
  };

  const product = (): number | null => {
    let left = primary();
    while (left !== null && (peek() === "*" || peek() === "/")) {
      const op = next();
      const right = primary();
      if (right === null) return null;
      left = op === "*" ? left * right : left / right;
    }
    return left;
  };

  const sum = (): number | null => {
    let left = product();
    while (left !== null && (peek() === "+" || peek() === "-")) {
      const op = next();
      const right = product();
      if (right === null) return null;
      left = op === "+" ? left + right : left - right;
    }
    return left;
  };

  const value = sum();
  if (value === null || pos !== tokens.length || !Number.isFinite(value)) return null;
  return value;
}

/** `%.10g` style: ten significant digits, no trailing zeros. */
export const formatInertia = (value: number) => String(Number(value.toPrecision(10)));

/**
 * Folds a non-zero inertial `<origin rpy>` into the inertia tensor (I' = R I Rᵀ) and resets
 * the rpy to zero. Returns whether the link was changed.
 */
export function zeroInertialOrientation(link: XmlElement, warn: WarningSink): boolean {
  const inertial = findChild(link, "inertial");
  const origin = inertial ? findChild(inertial, "origin") : null;
  if (!inertial || !origin) return false;

  const linkName = getAttribute(link, "name") ?? "unknown";
  const rpyText = getAttribute(origin, "rpy") ?? "0 0 0";
  const parts = rpyText.trim().split(/\s+/);
  if (parts.length !== 3) {
    warn(`Invalid RPY format in inertial origin: '${rpyText}'`);
    return false;
  }
  const angles = parts.map(evaluateAngle);
  const [roll, pitch, yaw] = angles;
  if (roll === null || pitch === null || yaw === null) {
    warn(`Failed to transform inertial for link '${linkName}': cannot evaluate rpy '${rpyText}'`);
    return false;
  }
  if (Math.abs(roll) < RPY_EPSILON && Math.abs(pitch) < RPY_EPSILON && Math.abs(yaw) < RPY_EPSILON) return false;

  const inertia = findChild(inertial, "inertia");
  if (!inertia) return false;

  const read = (key: (typeof INERTIA_KEYS)[number]) => Number.parseFloat(getAttribute(inertia, key) ?? "0");
  const [ixx, ixy, ixz, iyy, iyz, izz] = INERTIA_KEYS.map(read);
  if (![ixx, ixy, ixz, iyy, iyz, izz].every(Number.isFinite)) {
    warn(`Failed to transform inertial for link '${linkName}': non-numeric inertia values`);
    return false;
  }

  const tensor = new THREE.Matrix3().set(ixx, ixy, ixz, ixy, iyy, iyz, ixz, iyz, izz);
  const rotation = new THREE.Matrix3().setFromMatrix4(
    new THREE.Matrix4().makeRotationFromEuler(new THREE.Euler(roll, pitch, yaw, "ZYX"))
  );
  const rotated = rotation.clone().multiply(tensor).multiply(rotation.clone().transpose());
  // Matrix3.elements is column-major.
  const at = (row: number, col: number) => rotated.elements[col * 3 + row];

  inertia.attrs.ixx = formatInertia(at(0, 0));
  inertia.attrs.ixy = formatInertia(at(0, 1));
  inertia.attrs.ixz = formatInertia(at(0, 2));
  inertia.attrs.iyy = formatInertia(at(1, 1));
  inertia.attrs.iyz = formatInertia(at(1, 2));
  inertia.attrs.izz = formatInertia(at(2, 2));
  origin.attrs.rpy = "0 0 0";

  logDebug(
    `Zeroed inertial orientation for link '${linkName}' (was: ${roll.toFixed(4)} ${pitch.toFixed(4)} ${yaw.toFixed(4)})`,
    { scope: "urdf" }
  );
  return true;
}
