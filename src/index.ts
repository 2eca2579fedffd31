export * from "./core/version-parser";
export * from "./core/branch-classifier";
export * from "./core/run-mode";
export * from "./core/consistency";
export * from "./core/scm";
export * from "./core/config";
export * from "./core/logger";
export * from "./core/orchestrator";
export * from "./types/errors";
export * from "./types/result";
