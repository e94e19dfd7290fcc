export * from "./domain.js";
export * from "./ports.js";
export * from "./signature.js";
export * from "./file-lock.js";
export * from "./diagnostics.js";
export * from "./ops-config.js";
export * from "./usage-ledger.js";
export * from "./pipeline-log.js";
