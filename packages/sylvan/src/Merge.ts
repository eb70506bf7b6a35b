import { InvalidArgumentError } from "./errors";
import type { StructNode } from "./Node";
import { cloneValue, isKeyedList, isStructNode, valueEquals } from "./Node";

export interface MergePolicy {
  /**
   * An absent list and a present but empty one merge to the empty list,
   * whichever side holds it. Without it an empty `src` list is ignored.
   */
  readonly mergeEmptyMaps?: boolean;
  /** Two differing populated leaves are an error instead of `src` winning. */
  readonly rejectConflicts?: boolean;
}

const checkConflicts = (dst: StructNode, src: StructNode): void => {
  for (const [name, spec, value] of src.fields()) {
    const existing = dst.get(name);
    if (value === undefined || existing === undefined) continue;

    switch (spec._tag) {
      case "Leaf":
      case "LeafList": {
        if (!valueEquals(existing, value)) {
          throw new InvalidArgumentError(`conflicting values for ${dst.type.name}.${name} while merging`);
        }
        break;
      }
      case "Child": {
        if (isStructNode(existing) && isStructNode(value)) checkConflicts(existing, value);
        break;
      }
      case "List": {
        if (!isKeyedList(existing) || !isKeyedList(value)) break;
        for (const [key, entry] of value) {
          const current = existing.get(key);
          if (current !== undefined) checkConflicts(current, entry);
        }
        break;
      }
    }
  }
};

const apply = (dst: StructNode, src: StructNode, policy: MergePolicy): void => {
  for (const [name, spec, value] of src.fields()) {
    if (value === undefined) continue;
    const existing = dst.get(name);

    switch (spec._tag) {
      case "Leaf":
      case "LeafList": {
        dst.set(name, cloneValue(value));
        break;
      }
      case "Child": {
        if (!isStructNode(value)) break;
        if (isStructNode(existing)) {
          apply(existing, value, policy);
        } else {
          dst.set(name, value.clone());
        }
        break;
      }
      case "List": {
        if (!isKeyedList(value)) break;
        if (value.size === 0 && policy.mergeEmptyMaps !== true) break;
        const target = dst.getOrCreateList(name);
        for (const [key, entry] of value) {
          const current = target.get(key);
          if (current === undefined) {
            target.set(key, entry.clone());
          } else {
            apply(current, entry, policy);
          }
        }
        break;
      }
    }
  }
};

/**
 * Merges `src` into `dst` in place. Leaves of `src` win, containers merge
 * recursively, lists take the union of their entries. Under
 * `rejectConflicts` a conflict fails the merge before `dst` is touched.
 */
export const mergeInto = (dst: StructNode, src: StructNode, policy: MergePolicy = {}): void => {
  if (dst.type !== src.type) {
    throw new InvalidArgumentError(`cannot merge ${src.type.name} into ${dst.type.name}: types differ`);
  }
  if (policy.rejectConflicts === true) {
    checkConflicts(dst, src);
  }
  apply(dst, src, policy);
};

/**
 * Returns a new node holding `src` merged into a copy of `dst`. Neither
 * input is modified.
 */
export const merge = (dst: StructNode, src: StructNode, policy: MergePolicy = {}): StructNode => {
  if (dst.type !== src.type) {
    throw new InvalidArgumentError(`cannot merge ${src.type.name} into ${dst.type.name}: types differ`);
  }
  const out = dst.clone();
  mergeInto(out, src, policy);
  return out;
};
