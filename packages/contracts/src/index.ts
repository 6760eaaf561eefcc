export * from "./schemas/codec";
export * from "./types/codec";
export * from "./types/error";
export * from "./types/result";
export * from "./utils/builder";
