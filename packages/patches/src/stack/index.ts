export * from "./location-group.js";
export * from "./stack-snapshot.js";
