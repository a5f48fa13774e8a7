export * from "./synthesizeDefinition";
