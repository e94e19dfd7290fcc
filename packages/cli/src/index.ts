export * from "./args.js";
export * from "./commands.js";
export * from "./report.js";
export * from "./shell.js";
