export * from "./client.ts";
export * from "./comments.ts";
export * from "./raw.ts";
export * from "./retry.ts";
export type * from "./types.ts";
