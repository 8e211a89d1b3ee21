import type { PatchName } from "../name/patch-name.js";

/**
 * Identifier for a patch or position within the stack.
 *
 * - `name`: a patch name, or text that may still turn out to be an index,
 *   a name with trailing offsets or a commit id prefix (see resolution)
 * - `base`: the stack base, spelled `{base}`; it is not a patch itself
 * - `top`: the last applied patch, spelled `@`
 * - `belowLast`: `^[N]`, N patches before the last visible patch; a
 *   negative N moves past it into the hidden patches
 * - `belowTop`: an absolute index, or the top when `index` is absent
 *   (the anchor of offsets-only locators such as `~2`)
 */
export type PatchId =
  | { readonly kind: "name"; readonly name: PatchName }
  | { readonly kind: "base" }
  | { readonly kind: "top" }
  | { readonly kind: "belowLast"; readonly offset?: number }
  | { readonly kind: "belowTop"; readonly index?: number };

export const PatchId = {
  name: (name: PatchName): PatchId => Object.freeze<PatchId>({ kind: "name", name }),
  base: (): PatchId => Object.freeze<PatchId>({ kind: "base" }),
  top: (): PatchId => Object.freeze<PatchId>({ kind: "top" }),
  belowLast: (offset?: number): PatchId => Object.freeze<PatchId>({ kind: "belowLast", offset }),
  belowTop: (index?: number): PatchId => Object.freeze<PatchId>({ kind: "belowTop", index }),
} as const;

export function formatPatchId(id: PatchId): string {
  switch (id.kind) {
    case "name":
      return id.name.toString();
    case "base":
      return "{base}";
    case "top":
      return "@";
    case "belowLast":
      return id.offset === undefined ? "^" : `^${id.offset}`;
    case "belowTop":
      return id.index === undefined ? "" : String(id.index);
  }
}
