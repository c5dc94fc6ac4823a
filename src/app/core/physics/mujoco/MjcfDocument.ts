import {
  createElement,
  findChild,
  insertChild,
  appendChild,
  parseXmlString,
  serializeXml,
  type XmlElement,
  type XmlSerializeOptions,
} from "../../xml/xmlTree";

export type MjcfSection = "compiler" | "option" | "asset" | "worldbody" | "extension" | "actuator" | "equality";

export type MjcfParseResult = { document: MjcfDocument | null; warnings: string[] };

/**
 * Handle around a parsed MJCF tree. Every transformation receives it explicitly and
 * mutates `root` in place; section lookups always reflect the current tree.
 */
export class MjcfDocument {
  readonly root: XmlElement;

  constructor(root: XmlElement) {
    this.root = root;
  }

  static parse(xml: string): MjcfParseResult {
    const parsed = parseXmlString(xml);
    if (!parsed.root) return { document: null, warnings: parsed.warnings };
    const warnings = [...parsed.warnings];
    if (parsed.root.tag !== "mujoco") {
      warnings.push(`Expected <mujoco> root element, found <${parsed.root.tag}>.`);
    }
    return { document: new MjcfDocument(parsed.root), warnings };
  }

  section(tag: MjcfSection | string): XmlElement | null {
    return findChild(this.root, tag);
  }

  get compiler() {
    return this.section("compiler");
  }

  get option() {
    return this.section("option");
  }

  get worldbody() {
    return this.section("worldbody");
  }

  get extension() {
    return this.section("extension");
  }

  get actuator() {
    return this.section("actuator");
  }

  get asset() {
    return this.section("asset");
  }

  indexOfSection(tag: string): number {
    return this.root.children.findIndex((child) => child.tag === tag);
  }

  /** Existing top-level section, else a new one right before <worldbody>, else appended. */
  ensureBeforeWorldbody(tag: string): XmlElement {
    const existing = this.section(tag);
    if (existing) return existing;
    const node = createElement(tag);
    const worldbodyIndex = this.indexOfSection("worldbody");
    if (worldbodyIndex >= 0) return insertChild(this.root, worldbodyIndex, node);
    return appendChild(this.root, node);
  }

  /** Existing top-level section, else a new one right after `anchor`, else first. */
  ensureAfter(tag: string, anchor: string): XmlElement {
    const existing = this.section(tag);
    if (existing) return existing;
    const node = createElement(tag);
    const anchorIndex = this.indexOfSection(anchor);
    return insertChild(this.root, anchorIndex >= 0 ? anchorIndex + 1 : 0, node);
  }

  ensureExtension(): XmlElement {
    const existing = this.extension;
    if (existing) return existing;
    if (this.indexOfSection("compiler") >= 0) return this.ensureAfter("extension", "compiler");
    return this.ensureBeforeWorldbody("extension");
  }

  ensureActuatorSection(): XmlElement {
    const existing = this.actuator;
    if (existing) return existing;
    const node = createElement("actuator");
    const worldbodyIndex = this.indexOfSection("worldbody");
    if (worldbodyIndex >= 0) return insertChild(this.root, worldbodyIndex + 1, node);
    return appendChild(this.root, node);
  }

  toXml(options: XmlSerializeOptions = { declaration: true }): string {
    return serializeXml(this.root, options);
  }
}
