/**
 * @fileoverview Domain Layer Barrel Export
 *
 * Central export point for domain types, schemas and errors.
 *
 * @module domain
 */

export * from "./config/index.ts";
export * from "./errors.ts";
export * from "./submission/index.ts";
