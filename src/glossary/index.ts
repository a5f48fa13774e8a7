export * from "./errors";
export * from "./mergeGlossaryTerm";
export * from "./ingestTerms";
export * from "./inMemoryGlossaryStore";
export * from "./sqliteGlossaryStore";
