export * from "./inlay";
