export * from "../../index.js";

export type * from "../shared/logger/console-logger.js";
export { default as ConsoleLogger } from "../shared/logger/console-logger.js";

export type * from "../shared/logger/void-logger.js";
export { default as VoidLogger } from "../shared/logger/void-logger.js";

export type * from "./setup/setup-on-node.js";
export { default as setupOnNode } from "./setup/setup-on-node.js";
