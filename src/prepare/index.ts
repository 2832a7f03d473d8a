export * from "./message.ts";
export * from "./pr-as-commit.ts";
export * from "./reconcile.ts";
