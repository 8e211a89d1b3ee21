export * from "./ref-name.js";
export * from "./refs.js";
