export * from "./logger";
export * from "./supporters";
export * from "./render";
export * from "./textNormalization";
export * from "./clients/http";
