export * from "./fragmentFilter";
