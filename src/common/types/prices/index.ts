export * from "./price.types";
