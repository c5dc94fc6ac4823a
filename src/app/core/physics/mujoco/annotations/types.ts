import type { XmlAttributes, XmlElement } from "../../../xml/xmlTree";

export type InjectSource = "inject_attr" | "inject_attrs";

export type AnnotationOperation =
  | { kind: "inject"; source: InjectSource; attrs: XmlAttributes }
  | { kind: "replace"; attrs: XmlAttributes }
  | { kind: "conditional-replace"; conditions: XmlAttributes; replacements: XmlAttributes }
  | { kind: "inject-children"; match: XmlAttributes };

export type AnnotationPattern = {
  tag: string;
  attrs: XmlAttributes;
};

/**
 * One recursion step of the annotation walk.
 * - consumed: the fragment carries operations and mutates matched targets
 * - recurse: a direct child carries operations; `parents` become its context
 * - fallback: plain fragment, injected into `targets` or created when there are none
 */
export type DispatchPlan =
  | {
      kind: "consumed";
      pattern: AnnotationPattern;
      operations: AnnotationOperation[];
      targets: XmlElement[];
      childTargets: XmlElement[];
      placeholder: boolean;
    }
  | { kind: "recurse"; pattern: AnnotationPattern; parents: XmlElement[] }
  | { kind: "fallback"; pattern: AnnotationPattern; targets: XmlElement[] };

export type AnnotationReport = {
  fragments: number;
  consumed: number;
  recursed: number;
  fallbacks: number;
  created: number;
  unmatched: number;
};

export const emptyAnnotationReport = (): AnnotationReport => ({
  fragments: 0,
  consumed: 0,
  recursed: 0,
  fallbacks: 0,
  created: 0,
  unmatched: 0,
});
