export * from "./change-id.ts";
export * from "./types.ts";
