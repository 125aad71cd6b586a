/**
 * formatprofiles
 * Profile and template resolution: decides which service profiles apply to
 * the uploaded files and submitted parameters, and derives the filenames and
 * metadata of every output file.
 */

export const VERSION = "0.1.0";

export * from "./errors";
export * from "./metadata";
export * from "./formats";
export * from "./parameters";
export * from "./conditions";
export * from "./constraints";
export * from "./metafields";
export * from "./input_template";
export * from "./output_template";
export * from "./profile";
export * from "./profiler";
export * from "./registry";
export * from "./rendering";
export { loadServiceConfig, parseServiceConfig, SPEC_VERSION } from "./config";
export type { ServiceDefinition, ServiceSettings } from "./config";
export type * from "./types";
