// backend/src/types/index.ts

export * from "./domain";
export * from "./routing";
export * from "./tutoring";
export * from "./stores";
