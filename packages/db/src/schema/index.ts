export * from "./transactions.js";
