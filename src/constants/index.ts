/**
 * Constants barrel exports
 */

export * from "./logger";
export * from "./textNormalization";
export * from "./lexicon";
export * from "./validation";
export * from "./candidates";
export * from "./definitions";
export * from "./extraction";
export * from "./glossary";
