export { runCli, createProgram, toUpdateRequest } from "./program.js";
export type { CliOutput } from "./program.js";
export { runUpdate, resolveRunOptions } from "./update-command.js";
export type { UpdateDeps, UpdateRequest } from "./update-command.js";
