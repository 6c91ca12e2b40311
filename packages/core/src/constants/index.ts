export * from "./defaults";
export * from "./labels";
export * from "./timeouts";
