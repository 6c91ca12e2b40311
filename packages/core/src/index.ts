export * from "./fleet";
export * from "./constants";

export const SCRATCHFLEET_VERSION = "0.1.0";
