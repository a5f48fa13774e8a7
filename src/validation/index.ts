export * from "./rules";
export * from "./termValidator";
