export * from "./gitreview.ts";
export * from "./query.ts";
export * from "./resolver.ts";
export * from "./rest-client.ts";
