export * from "./src/all/mod.ts";
