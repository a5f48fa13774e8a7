export * from "./logger";
export * from "./pages";
export * from "./lexicon";
export * from "./validation";
export * from "./candidates";
export * from "./definitions";
export * from "./glossary";
export * from "./extraction";
export * from "./runs";
export * from "./db";
