export * from "./discovery";
export * from "./catalog";
