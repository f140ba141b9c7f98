// src/core/macro/index.ts

export * from "./types";
export * from "./table";
export * from "./queue";
