export * from "./session";
export * from "./attach";
export * from "./file-index";
export * from "./case-list";
export * from "./documents";
export * from "./notes";
export * from "./engine";
