export * from "./candidates";
export * from "./definitions";
export * from "./analyzers/compromiseAnalyzer";
export * from "./extractTerms";
