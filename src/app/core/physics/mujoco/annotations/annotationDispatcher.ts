import { logDebug, logInfo, warnSink, type WarningSink } from "../../../services/logger";
import {
  appendChild,
  cloneElement,
  describeElement,
  findChild,
  formatAttributes,
  type XmlElement,
} from "../../../xml/xmlTree";
import type { MjcfDocument } from "../MjcfDocument";
import { applyOperations, injectChildren } from "./operationApplier";
import { hasOperations, parseOperations, stripOperationAttributes } from "./operationParser";
import { findExactMatches, findMatchingElements } from "./patternMatcher";
import { emptyAnnotationReport, type AnnotationPattern, type AnnotationReport, type DispatchPlan } from "./types";

const SCOPE = "annotations";

export type WalkState = {
  doc: MjcfDocument;
  warn: WarningSink;
  report: AnnotationReport;
};

const describePattern = (pattern: AnnotationPattern) => {
  const attrs = formatAttributes(pattern.attrs);
  return attrs ? `<${pattern.tag} ${attrs}>` : `<${pattern.tag}>`;
};

const describeContext = (context: XmlElement | null) => (context ? `within <${context.tag}>` : "globally");

/**
 * Decides what one annotation element does against the current tree. Reads the tree but
 * never mutates it; operation parse problems go to `warn`.
 */
export function planFragment(
  doc: MjcfDocument,
  fragment: XmlElement,
  context: XmlElement | null,
  warn: WarningSink
): DispatchPlan {
  const scope = context ?? doc.root;
  const pattern: AnnotationPattern = { tag: fragment.tag, attrs: stripOperationAttributes(fragment.attrs) };
  const parsed = parseOperations(fragment, warn);
  const childOp = parsed.find((op) => op.kind === "inject-children");

  if (parsed.length) {
    // inject_children takes over the element; its other operations are dropped.
    const operations = childOp ? [childOp] : parsed;
    const targets = childOp ? [] : findMatchingElements(scope, pattern.tag, pattern.attrs);
    const childTargets =
      childOp && childOp.kind === "inject-children" ? findExactMatches(scope, pattern.tag, childOp.match) : [];
    const placeholder =
      targets.length === 0 &&
      context === null &&
      Object.keys(pattern.attrs).length === 0 &&
      operations.some((op) => op.kind === "inject");
    return { kind: "consumed", pattern, operations, targets, childTargets, placeholder };
  }

  if (fragment.children.some(hasOperations)) {
    return { kind: "recurse", pattern, parents: findMatchingElements(scope, pattern.tag, pattern.attrs) };
  }

  const targets = Object.keys(pattern.attrs).length ? findMatchingElements(doc.root, pattern.tag, pattern.attrs) : [];
  return { kind: "fallback", pattern, targets };
}

function copyInto(target: XmlElement, fragment: XmlElement) {
  for (const [name, value] of Object.entries(stripOperationAttributes(fragment.attrs))) {
    target.attrs[name] = value;
    logDebug(`Copied attribute ${name}='${value}' to <${target.tag}>`, { scope: SCOPE });
  }
  for (const child of fragment.children) {
    const copy = appendChild(target, cloneElement(child));
    logDebug(`Injected <${copy.tag}> into <${target.tag}>.`, { scope: SCOPE });
  }
}

function executeConsumed(
  state: WalkState,
  fragment: XmlElement,
  plan: Extract<DispatchPlan, { kind: "consumed" }>,
  context: XmlElement | null
) {
  const { doc, warn, report } = state;
  report.consumed += 1;
  const attributeOps = plan.operations.filter((op) => op.kind !== "inject-children");
  const childOp = plan.operations.find((op) => op.kind === "inject-children");

  if (childOp && childOp.kind === "inject-children") {
    if (plan.childTargets.length) {
      for (const target of plan.childTargets) injectChildren(target, fragment);
    } else {
      report.unmatched += 1;
      warn(
        `No matching <${fragment.tag}> elements found with attributes [${formatAttributes(childOp.match)}] ${describeContext(context)}`
      );
    }
  }

  if (attributeOps.length) {
    if (plan.targets.length) {
      for (const target of plan.targets) applyOperations(target, attributeOps, warn);
    } else if (plan.placeholder) {
      const created = doc.ensureBeforeWorldbody(fragment.tag);
      report.created += 1;
      logDebug(`Created new <${fragment.tag}> tag in MJCF.`, { scope: SCOPE });
      applyOperations(created, attributeOps, warn);
    } else {
      report.unmatched += 1;
      warn(`No matching elements found for custom operations pattern ${describePattern(plan.pattern)} ${describeContext(context)}`);
    }
  }

  // Children of an inject_children element are its template, never injected on their own.
  if (childOp) return;
  for (const child of fragment.children) {
    processFragment(state, child, context);
  }
}

function executeRecurse(state: WalkState, fragment: XmlElement, plan: Extract<DispatchPlan, { kind: "recurse" }>) {
  state.report.recursed += 1;
  if (!plan.parents.length) {
    state.report.unmatched += 1;
    state.warn(`No matching parent element found for ${describeElement(fragment)} - cannot apply child operations`);
    return;
  }
  for (const parent of plan.parents) {
    for (const child of fragment.children) {
      if (hasOperations(child)) {
        processFragment(state, child, parent);
        continue;
      }
      appendChild(parent, cloneElement(child));
      logDebug(`Injected regular child <${child.tag}> into existing <${parent.tag}>.`, { scope: SCOPE });
    }
  }
}

function executeFallback(state: WalkState, fragment: XmlElement, plan: Extract<DispatchPlan, { kind: "fallback" }>) {
  const { doc, report } = state;
  report.fallbacks += 1;
  if (plan.targets.length) {
    for (const target of plan.targets) {
      logInfo(`Injecting element ${describeElement(fragment)} into existing element: ${describeElement(target)}`, {
        scope: SCOPE,
      });
      copyInto(target, fragment);
    }
    return;
  }

  let target = findChild(doc.root, fragment.tag);
  if (!target) {
    target = doc.ensureBeforeWorldbody(fragment.tag);
    report.created += 1;
    logDebug(`Created new <${fragment.tag}> tag in MJCF.`, { scope: SCOPE });
  }
  copyInto(target, fragment);
}

export function executePlan(state: WalkState, fragment: XmlElement, plan: DispatchPlan, context: XmlElement | null) {
  switch (plan.kind) {
    case "consumed":
      executeConsumed(state, fragment, plan, context);
      return;
    case "recurse":
      executeRecurse(state, fragment, plan);
      return;
    case "fallback":
      executeFallback(state, fragment, plan);
      return;
  }
}

export function processFragment(state: WalkState, fragment: XmlElement, context: XmlElement | null) {
  state.report.fragments += 1;
  const plan = planFragment(state.doc, fragment, context, state.warn);
  logDebug(`Processing ${describeElement(fragment)} as ${plan.kind}`, {
    scope: SCOPE,
    data: plan.kind === "consumed" ? plan.operations.map((op) => op.kind) : undefined,
  });
  executePlan(state, fragment, plan, context);
}

/**
 * Applies a forest of annotation fragments to the document, in order. Each fragment is
 * planned against the tree as left by the previous ones.
 */
export function applyAnnotationFragments(
  doc: MjcfDocument,
  fragments: readonly XmlElement[],
  warn: WarningSink = warnSink(SCOPE)
): AnnotationReport {
  const report = emptyAnnotationReport();
  if (!fragments.length) {
    logInfo("No custom MJCF elements found to inject.", { scope: SCOPE });
    return report;
  }
  logInfo(`Injecting ${fragments.length} custom MJCF element(s): ${fragments.map((f) => `<${f.tag}>`).join(", ")}`, {
    scope: SCOPE,
  });
  const state: WalkState = { doc, warn, report };
  for (const fragment of fragments) {
    processFragment(state, fragment, null);
  }
  return report;
}
