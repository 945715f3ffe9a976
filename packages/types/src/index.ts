export * from "./stocks";
