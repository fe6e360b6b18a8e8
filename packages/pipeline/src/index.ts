export * from "./stage";
export * from "./ordering";
export * from "./pipeline";
