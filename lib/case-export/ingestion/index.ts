export * from "./pipeline";
