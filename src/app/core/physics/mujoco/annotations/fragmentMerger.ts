import { cloneElement, type XmlAttributes, type XmlElement } from "../../../xml/xmlTree";

const sameAttributes = (a: XmlAttributes, b: XmlAttributes) => {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => Object.hasOwn(b, key) && a[key] === b[key]);
};

const trimmedText = (element: XmlElement) => (element.text ?? "").trim();

/** Same tag, same attribute set (order ignored) and same trimmed text. Children are not compared. */
export function elementsEquivalent(a: XmlElement, b: XmlElement): boolean {
  return a.tag === b.tag && sameAttributes(a.attrs, b.attrs) && trimmedText(a) === trimmedText(b);
}

function foldInto(accumulator: XmlElement, incoming: XmlElement) {
  for (const child of incoming.children) {
    const equivalent = accumulator.children.find((existing) => elementsEquivalent(existing, child));
    if (!equivalent) {
      accumulator.children.push(cloneElement(child));
      continue;
    }
    if (child.children.length || equivalent.children.length) {
      foldInto(equivalent, child);
    }
  }
}

/**
 * Unions fragments that share a root tag. Children differing by any attribute value stay
 * distinct siblings; equivalent children are merged recursively where they already sit.
 * Inputs are not modified.
 */
export function mergeFragments(fragments: readonly XmlElement[]): XmlElement | null {
  if (!fragments.length) return null;
  const merged = cloneElement(fragments[0]);
  for (const fragment of fragments.slice(1)) {
    foldInto(merged, fragment);
  }
  return merged;
}
