export * from "./types";
export * from "./console-observer";
export * from "./silent-observer";
