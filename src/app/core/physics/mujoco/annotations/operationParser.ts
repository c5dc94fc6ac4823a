import type { WarningSink } from "../../../services/logger";
import { getAttribute, type XmlAttributes, type XmlElement } from "../../../xml/xmlTree";
import type { AnnotationOperation, InjectSource } from "./types";

export const INJECT_ATTR = "inject_attr";
export const INJECT_ATTRS = "inject_attrs";
export const REPLACE_ATTRS = "replace_attrs";
export const INJECT_CHILDREN = "inject_children";

export const RESERVED_OPERATION_ATTRIBUTES: readonly string[] = [INJECT_ATTR, INJECT_ATTRS, REPLACE_ATTRS, INJECT_CHILDREN];

const EXPECTED_FORMAT = "Expected format like key1='value1' key2='value2' or key:='value'";

export type Assignment = {
  key: string;
  operator: "=" | ":=";
  value: string;
};

const isIdentifierChar = (ch: string | undefined) => ch !== undefined && /[A-Za-z0-9_]/.test(ch);
const isQuote = (ch: string | undefined): ch is "'" | '"' => ch === "'" || ch === '"';

/**
 * Scans `identifier (= | :=) quote ... quote` groups. Anything between groups is skipped,
 * and a value runs to the next occurrence of its own quote character, so it may hold
 * separators and the other quote.
 */
export function tokenizeAssignments(input: string): Assignment[] {
  const out: Assignment[] = [];
  let i = 0;
  while (i < input.length) {
    if (!isIdentifierChar(input[i])) {
      i += 1;
      continue;
    }
    let end = i;
    while (isIdentifierChar(input[end])) end += 1;
    const key = input.slice(i, end);

    let cursor = end;
    let operator: Assignment["operator"] | null = null;
    if (input.startsWith(":=", cursor)) {
      operator = ":=";
      cursor += 2;
    } else if (input[cursor] === "=") {
      operator = "=";
      cursor += 1;
    }

    const quote = input[cursor];
    if (operator && isQuote(quote)) {
      const close = input.indexOf(quote, cursor + 1);
      if (close >= 0) {
        out.push({ key, operator, value: input.slice(cursor + 1, close) });
        i = close + 1;
        continue;
      }
    }
    i = end;
  }
  return out;
}

/** Assignments as an attribute bag. Duplicate keys keep the last value and are reported. */
export function decodeAssignments(input: string, warn: WarningSink): XmlAttributes {
  const attrs: XmlAttributes = {};
  for (const { key, value } of tokenizeAssignments(input)) {
    if (Object.hasOwn(attrs, key)) {
      warn(`Duplicate attribute '${key}' found in '${input}'. Using last value: '${value}'`);
    }
    attrs[key] = value;
  }
  return attrs;
}

/** Index of the first `:` outside quotes that is not part of `:=`, or -1. */
export function findTopLevelColon(input: string): number {
  let quote: string | null = null;
  for (let i = 0; i < input.length; i += 1) {
    const ch = input[i];
    if (quote) {
      if (ch === quote) quote = null;
      continue;
    }
    if (isQuote(ch)) {
      quote = ch;
      continue;
    }
    if (ch === ":" && input[i + 1] !== "=") return i;
  }
  return -1;
}

const isEmpty = (attrs: XmlAttributes) => Object.keys(attrs).length === 0;

function parseAttributeList(input: string, warn: WarningSink): XmlAttributes | null {
  const attrs = decodeAssignments(input, warn);
  if (isEmpty(attrs)) {
    warn(`Could not parse attribute string: '${input}'. ${EXPECTED_FORMAT}`);
    return null;
  }
  return attrs;
}

export function parseConditionalReplacement(
  input: string,
  warn: WarningSink
): Extract<AnnotationOperation, { kind: "conditional-replace" }> | null {
  const colon = findTopLevelColon(input);
  if (colon < 0) {
    warn(`Invalid conditional replacement format: ${input}`);
    return null;
  }
  const conditions = decodeAssignments(input.slice(0, colon).trim(), warn);
  if (isEmpty(conditions)) {
    warn(`No valid conditions found in conditional replacement: ${input}`);
    return null;
  }
  const replacements = decodeAssignments(input.slice(colon + 1).trim(), warn);
  if (isEmpty(replacements)) {
    warn(`No valid replacements found in conditional replacement: ${input}`);
    return null;
  }
  return { kind: "conditional-replace", conditions, replacements };
}

const readReserved = (element: XmlElement, name: string) => {
  const value = getAttribute(element, name);
  return value && value.trim() ? value : null;
};

/**
 * Decodes the reserved operation attributes of an annotation element, in the order
 * inject_attr, inject_attrs, replace_attrs, inject_children. Unparseable values are
 * reported and dropped.
 */
export function parseOperations(element: XmlElement, warn: WarningSink): AnnotationOperation[] {
  const operations: AnnotationOperation[] = [];

  const injectSources: InjectSource[] = [INJECT_ATTR, INJECT_ATTRS];
  for (const source of injectSources) {
    const raw = readReserved(element, source);
    if (!raw) continue;
    const attrs = parseAttributeList(raw, warn);
    if (attrs) operations.push({ kind: "inject", source, attrs });
  }

  const replace = readReserved(element, REPLACE_ATTRS);
  if (replace) {
    if (findTopLevelColon(replace) >= 0) {
      const conditional = parseConditionalReplacement(replace, warn);
      if (conditional) operations.push(conditional);
    } else {
      const attrs = parseAttributeList(replace, warn);
      if (attrs) operations.push({ kind: "replace", attrs });
    }
  }

  const injectChildren = readReserved(element, INJECT_CHILDREN);
  if (injectChildren) {
    const match = parseAttributeList(injectChildren, warn);
    if (match) operations.push({ kind: "inject-children", match });
  }

  return operations;
}

const ignore: WarningSink = () => undefined;

export const hasOperations = (element: XmlElement) => parseOperations(element, ignore).length > 0;

export function stripOperationAttributes(attrs: XmlAttributes): XmlAttributes {
  const out: XmlAttributes = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (!RESERVED_OPERATION_ATTRIBUTES.includes(key)) out[key] = value;
  }
  return out;
}
