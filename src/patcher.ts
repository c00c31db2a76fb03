/**
 * Structural patcher - turns momentary push knobs into infinite-push knobs
 *
 * Per catalog record: the separate push button Component is removed, and the
 * knob Component's template reference (its first child element) is pointed at
 * the infinite-push template with four parameters.
 */
import type { ModificationCatalog, ModificationRecord } from "./catalog.js";
import { AmbiguousNodeError, CatalogResolutionError, NodeNotFoundError, type RecordFailure } from "./errors.js";
import { findByAttribute } from "./behavior-xml/query.js";
import type { BehaviorTree, NodeHandle } from "./behavior-xml/tree.js";

export const COMPONENT_ELEMENT = "Component";
export const ID_ATTRIBUTE = "ID";
export const NAME_ATTRIBUTE = "Name";

/** Injected parameter elements, in the order the template reads them */
export const TEMPLATE_PARAMETERS = [
  ["KNOB_ANIM_NAME", "KnobAnimName"],
  ["KNOB_CHANGE_NAME", "KnobChangeName"],
  ["PUSH_ANIM_NAME", "PushAnimName"],
  ["PUSH_NAME", "PushName"],
] as const satisfies ReadonlyArray<readonly [string, keyof ModificationRecord]>;

export interface PatchOptions {
  /** Value written to the template reference's Name attribute */
  templateName: string;
  /** Used in error messages only */
  source?: string;
}

export function findSingleComponent(tree: BehaviorTree, componentId: string): NodeHandle {
  const matches = findByAttribute(tree, ID_ATTRIBUTE, componentId, COMPONENT_ELEMENT);
  if (matches.length === 0) throw new NodeNotFoundError(componentId);
  if (matches.length > 1) throw new AmbiguousNodeError(componentId, matches.length);
  return matches[0];
}

/** Applies one record to the tree; returns the rewritten template reference. */
export function applyModification(tree: BehaviorTree, record: ModificationRecord, templateName: string): NodeHandle {
  const button = findSingleComponent(tree, record.ButtonId);
  tree.detach(button);

  const knob = findSingleComponent(tree, record.KnobId);
  const templateRef = tree.firstElementChild(knob);
  if (templateRef === undefined) {
    throw new NodeNotFoundError(record.KnobId, `Component '${record.KnobId}' has no template reference element`);
  }

  tree.setAttribute(templateRef, NAME_ATTRIBUTE, templateName);
  tree.clearContent(templateRef, [NAME_ATTRIBUTE]);
  for (const [element, field] of TEMPLATE_PARAMETERS) {
    tree.appendChild(templateRef, tree.createTextElement(element, record[field]));
  }
  return templateRef;
}

/**
 * Applies every record in catalog order. A record that does not resolve is
 * recorded and the pass continues; all failures are then raised together, so
 * the caller never gets a partially patched tree back.
 */
export function applyModifications(tree: BehaviorTree, catalog: ModificationCatalog, options: PatchOptions): void {
  const failures: RecordFailure[] = [];

  catalog.Modifications.forEach((record, index) => {
    try {
      applyModification(tree, record, options.templateName);
    } catch (e) {
      if (e instanceof NodeNotFoundError || e instanceof AmbiguousNodeError) failures.push({ index, error: e });
      else throw e;
    }
  });

  if (failures.length) throw new CatalogResolutionError(failures, options.source);
}
