export * from "./logger";
export * from "./config";
export * from "./supporters";
export * from "./render";
export * from "./clients/http";
