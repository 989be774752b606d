export * from "./accounts";
export * from "./group-registry";
export * from "./queue";
export * from "./reconciler";
export * from "./scheduler";
export * from "./start-worker";
export * from "./sync";
export * from "./transfers";
