export * from "./common";
export * from "./config";
export * from "./context";
export * from "./localizer";
export * from "./translator";
