export * from "./types/selector";
export * from "./src";
