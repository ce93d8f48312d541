export * from "./types";
export * from "./csv-source";
export * from "./memory-source";
