import type { ObjectId } from "../common/id/object-id.js";

/**
 * A reference pointing directly at an object.
 */
export interface Ref {
  readonly name: string;
  readonly objectId: ObjectId;
}

/**
 * Read access to references.
 */
export interface Refs {
  /**
   * Resolve a ref to its final object id, following symbolic refs.
   */
  resolve(refName: string): Promise<Ref | undefined>;
}
