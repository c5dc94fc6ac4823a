import { describe, expect, it, vi } from "vitest";
import { createElement } from "../../../xml/xmlTree";
import { applyOperation, applyOperations, injectChildren } from "./operationApplier";

describe("applyOperation", () => {
  it("injects new attributes and overwrites existing ones", () => {
    const target = createElement("joint", { name: "hip", damping: "1" });
    applyOperation(target, { kind: "inject", source: "inject_attrs", attrs: { damping: "2", armature: "0.1" } }, vi.fn());
    expect(target.attrs).toEqual({ name: "hip", damping: "2", armature: "0.1" });
  });

  it("replaces only attributes the target already has", () => {
    const warn = vi.fn();
    const target = createElement("geom", { rgba: "1 0 0 1" });
    applyOperation(target, { kind: "replace", attrs: { rgba: "0 1 0 1", size: "1" } }, warn);
    expect(target.attrs).toEqual({ rgba: "0 1 0 1" });
    expect(warn).toHaveBeenCalledWith(
      "Cannot replace non-existent attribute 'size' in <geom>. Use inject_attr(s) to add new attributes."
    );
  });

  it("removes the condition attributes before setting the replacements", () => {
    const target = createElement("geom", { class: "old", other: "x" });
    applyOperation(
      target,
      { kind: "conditional-replace", conditions: { class: "old" }, replacements: { class: "new" } },
      vi.fn()
    );
    expect(target.attrs).toEqual({ other: "x", class: "new" });
    expect(Object.keys(target.attrs)).toEqual(["other", "class"]);
  });

  it("leaves the target unchanged unless every condition holds", () => {
    const mismatch = createElement("geom", { class: "mismatch" });
    applyOperation(
      mismatch,
      { kind: "conditional-replace", conditions: { class: "old" }, replacements: { class: "new" } },
      vi.fn()
    );
    expect(mismatch.attrs).toEqual({ class: "mismatch" });

    const partial = createElement("geom", { a: "1", b: "3" });
    applyOperation(
      partial,
      { kind: "conditional-replace", conditions: { a: "1", b: "2" }, replacements: { c: "9" } },
      vi.fn()
    );
    expect(partial.attrs).toEqual({ a: "1", b: "3" });
  });

  it("applies a list in order", () => {
    const target = createElement("geom", { size: "1" });
    applyOperations(
      target,
      [
        { kind: "inject", source: "inject_attr", attrs: { size: "2" } },
        { kind: "replace", attrs: { size: "3" } },
      ],
      vi.fn()
    );
    expect(target.attrs.size).toBe("3");
  });
});

describe("injectChildren", () => {
  it("appends deep copies and repeats on every call", () => {
    const target = createElement("body", { name: "base" }, [createElement("geom")]);
    const template = createElement("body", { inject_children: "name='base'" }, [createElement("site", { name: "imu" })]);
    injectChildren(target, template);
    injectChildren(target, template);
    expect(target.children.map((child) => child.tag)).toEqual(["geom", "site", "site"]);
    target.children[1].attrs.name = "changed";
    expect(template.children[0].attrs.name).toBe("imu");
  });
});
