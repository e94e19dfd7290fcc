export type { PreValidator, ValidationContext, ValidationEvent, ValidationOutcome } from "./validator.js";
export * from "./commit-message.js";
export * from "./working-directory.js";
