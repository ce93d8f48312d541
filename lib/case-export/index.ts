/**
 * Case Export
 *
 * Joins the fil/sag/dokumentcdw/notat CSV exports into one nested JSON
 * tree of cases.
 */

// Core types
export * from "./types";
export * from "./constants";
export * from "./errors";
export * from "./config";
export * from "./api/schemas";

// Observability
export * from "./observability";

// Row sources
export * from "./sources";

// Join engine
export * from "./join";

// Output
export * from "./output/serialize";

// Pipeline
export * from "./ingestion";
