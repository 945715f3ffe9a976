export * from "./errors";
export * from "./stocks";
export * from "./sqlite";
export * from "./moments";
export * from "./analytics";
export * from "./adhoc";
export * from "./series";
