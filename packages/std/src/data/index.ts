export * from "./range.js";
