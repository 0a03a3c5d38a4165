export * from "./entities";
export * from "./review";
