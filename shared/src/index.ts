export * from "./constants";
export * from "./types";
export * from "./errors";
export * from "./jobStore";
export * from "./wire";
export * from "./sleep";
export * from "./brokerClient";
