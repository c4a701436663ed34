export * from "./types";
export * from "./GestureControlLoop";
