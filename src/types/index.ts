export * from "./logger";
export * from "./company";
export * from "./candidates";
export * from "./content";
export * from "./failures";
export * from "./discovery";
export * from "./vocabulary";
export * from "./policy";
export * from "./scoring";
export * from "./config";
export * from "./db";
export * from "./batch";
export * from "./clients/http";
export * from "./clients/search";
