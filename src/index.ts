export * from "./hash/index.js";
