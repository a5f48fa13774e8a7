/**
 * Utils barrel exports
 */

export * from "./text/textNormalization";
export * from "./text/termPreprocessing";
export * from "./text/termKey";
export * from "./concurrency";
export * from "./dbErrors";
export * from "./language";
export * from "./lexiconValidation";
export * from "./pageFileParsing";
