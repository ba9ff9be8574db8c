export * from "./types/game";
export * from "./types/session";
export * from "./result";
export * from "./errors";
export * from "./difficulty";
