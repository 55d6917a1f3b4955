export * from "./paths/PathHelper.js";
export * from "./workspace/WorkspaceTypes.js";
export * from "./errors/SidekickError.js";
export * from "./concurrency/KeyedLock.js";
