export * from "./sentences";
export * from "./patternStrategy";
export * from "./linguisticStrategy";
export * from "./generateCandidates";
