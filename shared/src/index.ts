export * from "./types/claim";
export * from "./types/extraction";
export * from "./labels";
