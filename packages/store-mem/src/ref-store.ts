/**
 * In-memory Refs implementation
 *
 * No persistence - data is lost when the instance is garbage collected.
 */

import type { ObjectId, Ref, Refs } from "@patchstack/core";

/**
 * Maximum depth for following symbolic refs to prevent infinite loops.
 */
const MAX_SYMBOLIC_REF_DEPTH = 100;

/**
 * Internal storage entry - either a direct ref or symbolic ref
 */
type RefEntry = { type: "direct"; objectId: ObjectId } | { type: "symbolic"; target: string };

export class MemoryRefStore implements Refs {
  private refs = new Map<string, RefEntry>();

  async resolve(refName: string): Promise<Ref | undefined> {
    let current = refName;
    let depth = 0;

    while (depth < MAX_SYMBOLIC_REF_DEPTH) {
      const entry = this.refs.get(current);
      if (!entry) {
        return undefined;
      }
      if (entry.type === "direct") {
        return { name: current, objectId: entry.objectId };
      }

      // Follow symbolic ref
      current = entry.target;
      depth++;
    }

    throw new Error(`Symbolic ref chain too deep (> ${MAX_SYMBOLIC_REF_DEPTH})`);
  }

  /**
   * Set a ref to point to an object ID.
   */
  async set(refName: string, objectId: ObjectId): Promise<void> {
    this.refs.set(refName, { type: "direct", objectId });
  }

  /**
   * Set a symbolic ref.
   */
  async setSymbolic(refName: string, target: string): Promise<void> {
    this.refs.set(refName, { type: "symbolic", target });
  }
}
