export * from "./error.types";
export * from "./source-error.types";
export * from "./gateway-error.types";
