export * from "./errors";
export * from "./cell-executor";
export * from "./viz-element";
export * from "./network-log";
export * from "./notebook-profiler";
export * from "./session";
export * from "./browser";
export * from "./config";
export * from "./metrics-csv";
export * from "./screenshots";
export * from "./profile-notebook";
export * from "./generate-and-profile";
