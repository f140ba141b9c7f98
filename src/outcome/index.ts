export * from "./outcome";
export * from "./failure";
export * from "./codes";
export * from "./error";
export * from "./constructors";
