export * from "./types";
export * from "./actions";
export * from "./KeyDispatcher";
export * from "./senders";
