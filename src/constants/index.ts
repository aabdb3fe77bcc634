/**
 * Constants barrel exports
 */

export * from "./logger";
export * from "./discovery";
export * from "./content";
export * from "./scoring";
export * from "./failures";
export * from "./config";
export * from "./vocabulary";
export * from "./clients/http";
