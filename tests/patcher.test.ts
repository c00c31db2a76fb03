/**
 * Tests for the structural patcher: button removal, knob template rewrite,
 * and failure reporting for unresolved IDs
 */
import { describe, expect, it } from "vitest";
import { findByAttribute } from "../src/behavior-xml/query.js";
import { parseAssetDocument } from "../src/behavior-xml/reader.js";
import { AmbiguousNodeError, CatalogResolutionError, NodeNotFoundError } from "../src/errors.js";
import { applyModification, applyModifications, findSingleComponent } from "../src/patcher.js";
import { BTN1_KNOB1, CRLF, HEADER, SOURCE, TEMPLATE_NAME, catalogOf } from "./helpers.js";

function bodyOf(...lines: string[]) {
  return parseAssetDocument([HEADER, "<ModelBehaviors>", ...lines, "</ModelBehaviors>"].join(CRLF)).body;
}

function catchError(fn: () => void): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected a failure");
}

describe("applyModifications", () => {
  it("removes the button and rewrites the knob template", () => {
    const { body } = parseAssetDocument(SOURCE);
    applyModifications(body, BTN1_KNOB1, { templateName: TEMPLATE_NAME });

    expect(findByAttribute(body, "ID", "BTN1")).toEqual([]);
    const knob = findSingleComponent(body, "KNOB1");
    const template = body.firstElementChild(knob);
    expect(template).toBeDefined();
    if (template === undefined) return;

    expect(body.element(template).attributes).toEqual([{ name: "Name", value: TEMPLATE_NAME }]);
    const params = body.children(template).map(h => [body.element(h).name, body.textContent(h)]);
    expect(params).toEqual([
      ["KNOB_ANIM_NAME", "A"],
      ["KNOB_CHANGE_NAME", "B"],
      ["PUSH_ANIM_NAME", "C"],
      ["PUSH_NAME", "D"],
    ]);
  });

  it("removes one element and adds four under the template", () => {
    const body = bodyOf('<Component ID="BTN1"/>', '<Component ID="KNOB1"><UseTemplate Name="Old"/></Component>');
    const before = body.countNodes("element");
    applyModifications(body, BTN1_KNOB1, { templateName: TEMPLATE_NAME });
    expect(body.countNodes("element") - before).toBe(3);
  });

  it("finds buttons and knobs at any depth", () => {
    const body = bodyOf(
      '<Component ID="PANEL">',
      '<Component ID="BTN1"/>',
      '<Component ID="KNOB1"><UseTemplate Name="Old"/></Component>',
      "</Component>",
    );
    applyModifications(body, BTN1_KNOB1, { templateName: TEMPLATE_NAME });
    const panel = findSingleComponent(body, "PANEL");
    expect(body.children(panel)).toHaveLength(1);
  });

  it("applies records in catalog order", () => {
    const body = bodyOf(
      '<Component ID="B1"/>',
      '<Component ID="K1"><UseTemplate Name="Old"/></Component>',
      '<Component ID="B2"/>',
      '<Component ID="K2"><UseTemplate Name="Old"/></Component>',
    );
    applyModifications(body, catalogOf({ ButtonId: "B1", KnobId: "K1" }, { ButtonId: "B2", KnobId: "K2", PushName: "P2" }), {
      templateName: TEMPLATE_NAME,
    });
    expect(body.children(body.root).map(h => body.getAttribute(h, "ID"))).toEqual(["K1", "K2"]);
    const k2Template = body.firstElementChild(findSingleComponent(body, "K2"));
    expect(k2Template).toBeDefined();
    if (k2Template === undefined) return;
    expect(body.textContent(body.children(k2Template)[3])).toBe("P2");
  });

  it("fails when a button ID matches nothing", () => {
    const { body } = parseAssetDocument(SOURCE);
    const error = catchError(() => applyModifications(body, catalogOf({ ButtonId: "NOPE" }), { templateName: TEMPLATE_NAME, source: "x.xml" }));
    expect(error).toBeInstanceOf(CatalogResolutionError);
    expect(error).toMatchObject({ message: "1 modification record(s) failed in 'x.xml': record #0: no Component with ID 'NOPE'" });
  });

  it("fails when a button ID matches more than one Component", () => {
    const body = bodyOf('<Component ID="BTN1"/>', '<Component ID="BTN1"/>', '<Component ID="KNOB1"><UseTemplate Name="Old"/></Component>');
    const error = catchError(() => applyModifications(body, BTN1_KNOB1, { templateName: TEMPLATE_NAME }));
    expect(error).toBeInstanceOf(CatalogResolutionError);
    if (!(error instanceof CatalogResolutionError)) return;
    expect(error.failures[0].error).toBeInstanceOf(AmbiguousNodeError);
    expect(error.failures[0].error).toMatchObject({ nodeId: "BTN1", matches: 2 });
  });

  it("fails when the knob ID is missing", () => {
    const body = bodyOf('<Component ID="BTN1"/>');
    const error = catchError(() => applyModifications(body, BTN1_KNOB1, { templateName: TEMPLATE_NAME }));
    if (!(error instanceof CatalogResolutionError)) throw error;
    expect(error.failures[0].error).toBeInstanceOf(NodeNotFoundError);
    expect(error.failures[0].error.nodeId).toBe("KNOB1");
  });

  it("collects every failing record before raising", () => {
    const { body } = parseAssetDocument(SOURCE);
    const catalog = catalogOf({ ButtonId: "X1" }, {}, { KnobId: "X3", ButtonId: "X2" });
    const error = catchError(() => applyModifications(body, catalog, { templateName: TEMPLATE_NAME }));
    if (!(error instanceof CatalogResolutionError)) throw error;
    expect(error.failures.map(f => [f.index, f.error.nodeId])).toEqual([[0, "X1"], [2, "X2"]]);
  });

  it("only matches Component elements", () => {
    const body = bodyOf('<Animation ID="BTN1"/>', '<Component ID="KNOB1"><UseTemplate Name="Old"/></Component>');
    expect(() => applyModifications(body, BTN1_KNOB1, { templateName: TEMPLATE_NAME })).toThrow(CatalogResolutionError);
  });
});

describe("applyModification", () => {
  it("rejects a knob without a template reference element", () => {
    const body = bodyOf('<Component ID="BTN1"/>', '<Component ID="KNOB1"><!-- empty --></Component>');
    const record = BTN1_KNOB1.Modifications[0];
    expect(() => applyModification(body, record, TEMPLATE_NAME)).toThrow("Component 'KNOB1' has no template reference element");
  });

  it("returns the rewritten template reference", () => {
    const body = bodyOf('<Component ID="BTN1"/>', '<Component ID="KNOB1"><UseTemplate Name="Old"/></Component>');
    const template = applyModification(body, BTN1_KNOB1.Modifications[0], TEMPLATE_NAME);
    expect(body.getAttribute(template, "Name")).toBe(TEMPLATE_NAME);
    expect(body.element(template).selfClosing).toBe(false);
  });
});
