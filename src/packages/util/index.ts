export * from "./metrics";
export * from "./misc";
export * from "./notebook-format";
export * from "./parameter-grid";
export { parseAssignments } from "./parse-assignments";
export * from "./python-format";
