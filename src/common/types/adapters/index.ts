export * from "./price-source.types";
