export * from "./errors.js";
export * from "./remediation.js";
export * from "./classify.js";
