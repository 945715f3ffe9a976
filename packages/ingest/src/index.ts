export * from "./errors";
export * from "./csv";
export * from "./validate";
export * from "./load";
