import { DOMParser } from "@xmldom/xmldom";

export type XmlAttributes = Record<string, string>;

export type XmlElement = {
  tag: string;
  attrs: XmlAttributes;
  // Character data directly inside the element; null when absent or whitespace-only.
  text: string | null;
  children: XmlElement[];
};

export type XmlParseResult = { root: XmlElement | null; warnings: string[] };

export type XmlSerializeOptions = {
  indent?: string;
  declaration?: boolean;
};

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

export function createElement(tag: string, attrs: XmlAttributes = {}, children: XmlElement[] = []): XmlElement {
  return { tag, attrs: { ...attrs }, text: null, children };
}

export function cloneElement(element: XmlElement): XmlElement {
  return {
    tag: element.tag,
    attrs: { ...element.attrs },
    text: element.text,
    children: element.children.map(cloneElement),
  };
}

export function getAttribute(element: XmlElement, name: string): string | undefined {
  return Object.hasOwn(element.attrs, name) ? element.attrs[name] : undefined;
}

export function hasAttribute(element: XmlElement, name: string): boolean {
  return Object.hasOwn(element.attrs, name);
}

export function findChild(parent: XmlElement, tag: string): XmlElement | null {
  return parent.children.find((child) => child.tag === tag) ?? null;
}

export function findChildren(parent: XmlElement, tag: string): XmlElement[] {
  return parent.children.filter((child) => child.tag === tag);
}

/** Every element below `root` in document order; `root` itself is not included. */
export function descendants(root: XmlElement): XmlElement[] {
  const out: XmlElement[] = [];
  const visit = (node: XmlElement) => {
    for (const child of node.children) {
      out.push(child);
      visit(child);
    }
  };
  visit(root);
  return out;
}

export function appendChild(parent: XmlElement, child: XmlElement): XmlElement {
  parent.children.push(child);
  return child;
}

export function insertChild(parent: XmlElement, index: number, child: XmlElement): XmlElement {
  const clamped = Math.max(0, Math.min(index, parent.children.length));
  parent.children.splice(clamped, 0, child);
  return child;
}

export function removeChild(parent: XmlElement, child: XmlElement): boolean {
  const index = parent.children.indexOf(child);
  if (index < 0) return false;
  parent.children.splice(index, 1);
  return true;
}

export const formatAttributes = (attrs: XmlAttributes) =>
  Object.entries(attrs)
    .map(([key, value]) => `${key}='${value}'`)
    .join(", ");

export const describeElement = (element: XmlElement) => {
  const attrs = formatAttributes(element.attrs);
  return attrs ? `<${element.tag} ${attrs}>` : `<${element.tag}>`;
};

const isElementNode = (node: Node): node is Element => node.nodeType === ELEMENT_NODE;

function readElement(node: Element): XmlElement {
  const attrs: XmlAttributes = {};
  for (let i = 0; i < node.attributes.length; i += 1) {
    const attr = node.attributes.item(i);
    if (attr) attrs[attr.name] = attr.value;
  }
  let text = "";
  const children: XmlElement[] = [];
  for (let i = 0; i < node.childNodes.length; i += 1) {
    const child = node.childNodes.item(i);
    if (!child) continue;
    if (isElementNode(child)) {
      children.push(readElement(child));
    } else if (child.nodeType === TEXT_NODE || child.nodeType === CDATA_SECTION_NODE) {
      text += child.nodeValue ?? "";
    }
  }
  return { tag: node.tagName, attrs, text: text.trim() ? text : null, children };
}

export function parseXmlString(xml: string): XmlParseResult {
  const problems: string[] = [];
  const report = (level: string) => (message: unknown) => {
    problems.push(`${level}: ${String(message).trim()}`);
  };
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: report("error"),
      fatalError: report("fatal"),
    },
  });

  let doc: Document | undefined;
  try {
    doc = parser.parseFromString(xml, "application/xml");
  } catch (error) {
    problems.push(`fatal: ${error instanceof Error ? error.message : String(error)}`);
  }

  const documentElement = doc?.documentElement ?? null;
  if (problems.length || !documentElement) {
    const details = problems.length ? ` ${problems.join("; ")}` : "";
    return { root: null, warnings: [`Failed to parse XML document.${details}`] };
  }
  return { root: readElement(documentElement), warnings: [] };
}

const escapeAttribute = (value: string) =>
  value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");

const escapeText = (value: string) => value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

export function serializeXml(root: XmlElement, options: XmlSerializeOptions = {}): string {
  const unit = options.indent ?? "  ";
  const lines: string[] = [];
  if (options.declaration) lines.push(`<?xml version="1.0" encoding="utf-8"?>`);

  const write = (element: XmlElement, depth: number) => {
    const pad = unit.repeat(depth);
    const attrs = Object.entries(element.attrs)
      .map(([key, value]) => ` ${key}="${escapeAttribute(value)}"`)
      .join("");
    const text = element.text?.trim() ?? "";
    if (!element.children.length && !text) {
      lines.push(`${pad}<${element.tag}${attrs} />`);
      return;
    }
    if (!element.children.length) {
      lines.push(`${pad}<${element.tag}${attrs}>${escapeText(text)}</${element.tag}>`);
      return;
    }
    lines.push(`${pad}<${element.tag}${attrs}>`);
    if (text) lines.push(`${pad}${unit}${escapeText(text)}`);
    for (const child of element.children) write(child, depth + 1);
    lines.push(`${pad}</${element.tag}>`);
  };

  write(root, 0);
  return `${lines.join("\n")}\n`;
}
