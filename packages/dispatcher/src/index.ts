export * from "./idempotency-guard.js";
export * from "./failure-tracker.js";
export * from "./classifier.js";
export * from "./dispatcher.js";
export * from "./escalation-runner.js";
export * from "./error-snapshots.js";
export * from "./prompt-audit.js";
export * from "./git-branch.js";
export * from "./validators/index.js";
export * from "./runtime.js";
export * as claudeCode from "./adapters/claude-code/index.js";
