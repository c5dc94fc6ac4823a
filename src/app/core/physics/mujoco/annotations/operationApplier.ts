import { logDebug, logInfo, type WarningSink } from "../../../services/logger";
import {
  cloneElement,
  describeElement,
  getAttribute,
  hasAttribute,
  type XmlAttributes,
  type XmlElement,
} from "../../../xml/xmlTree";
import type { AnnotationOperation } from "./types";

const SCOPE = "annotations";

function inject(target: XmlElement, attrs: XmlAttributes) {
  for (const [name, value] of Object.entries(attrs)) {
    const previous = getAttribute(target, name);
    target.attrs[name] = value;
    if (previous !== undefined) {
      logDebug(`Injected attribute ${name}='${value}' (overwrote '${previous}') into <${target.tag}>`, { scope: SCOPE });
    } else {
      logDebug(`Injected attribute ${name}='${value}' into <${target.tag}>`, { scope: SCOPE });
    }
  }
}

function replace(target: XmlElement, attrs: XmlAttributes, warn: WarningSink) {
  for (const [name, value] of Object.entries(attrs)) {
    const previous = getAttribute(target, name);
    if (previous === undefined) {
      warn(
        `Cannot replace non-existent attribute '${name}' in <${target.tag}>. Use inject_attr(s) to add new attributes.`
      );
      continue;
    }
    target.attrs[name] = value;
    logDebug(`Replaced attribute ${name}='${previous}' with '${value}' in <${target.tag}>`, { scope: SCOPE });
  }
}

function conditionalReplace(target: XmlElement, conditions: XmlAttributes, replacements: XmlAttributes) {
  const satisfied = Object.entries(conditions).every(([name, value]) => getAttribute(target, name) === value);
  if (!satisfied) {
    logDebug(`Conditional replacement conditions not met for ${describeElement(target)}`, { scope: SCOPE });
    return;
  }

  const changes: string[] = [];
  for (const name of Object.keys(conditions)) {
    if (!hasAttribute(target, name)) continue;
    changes.push(`removed ${name}='${target.attrs[name]}'`);
    delete target.attrs[name];
  }
  for (const [name, value] of Object.entries(replacements)) {
    const previous = getAttribute(target, name);
    target.attrs[name] = value;
    changes.push(previous !== undefined ? `set ${name}='${value}' (overwrote '${previous}')` : `set ${name}='${value}'`);
  }
  logDebug(`Conditional replacement applied to <${target.tag}>: ${changes.join(", ")}`, { scope: SCOPE });
}

/** Appends deep copies of every child of `template` to `target`. Repeated calls append again. */
export function injectChildren(target: XmlElement, template: XmlElement) {
  logInfo(`Injecting ${template.children.length} child element(s) into ${describeElement(target)}`, { scope: SCOPE });
  for (const child of template.children) {
    const copy = cloneElement(child);
    target.children.push(copy);
    logDebug(`Injected ${describeElement(copy)} into matching <${target.tag}>`, { scope: SCOPE });
  }
}

/**
 * Mutates one matched target. Inject always sets, replace only touches attributes the
 * target already has, conditional replace is all-or-nothing. Inject-children needs the
 * annotation element as template and is handled by `injectChildren`.
 */
export function applyOperation(target: XmlElement, operation: AnnotationOperation, warn: WarningSink) {
  switch (operation.kind) {
    case "inject":
      inject(target, operation.attrs);
      return;
    case "replace":
      replace(target, operation.attrs, warn);
      return;
    case "conditional-replace":
      conditionalReplace(target, operation.conditions, operation.replacements);
      return;
    case "inject-children":
      return;
  }
}

export function applyOperations(target: XmlElement, operations: readonly AnnotationOperation[], warn: WarningSink) {
  for (const operation of operations) {
    applyOperation(target, operation, warn);
  }
  logDebug(`Applied custom operations to element: ${describeElement(target)}`, { scope: SCOPE });
}
