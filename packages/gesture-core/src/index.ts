export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./schemas";
export * from "./classifier";
export * from "./bands";
export * from "./GestureStabilizer";
export * from "./GestureEngine";
