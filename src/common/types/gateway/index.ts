export * from "./gateway.types";
