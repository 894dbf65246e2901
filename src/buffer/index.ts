export * from "./buffer-utils";
