export * from "./keyedMutex";
export * from "./mapWithConcurrency";
