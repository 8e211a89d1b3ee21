/**
 * Base class for every failure to parse or resolve a patch reference.
 *
 * All subclasses describe expected outcomes of validating user input;
 * none of them is retried.
 */
export class PatchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PatchError";
  }
}
