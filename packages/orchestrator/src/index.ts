export * from "./channel";
export * from "./events";
export * from "./store";
export * from "./summary";
export * from "./importer";
export * from "./config";
