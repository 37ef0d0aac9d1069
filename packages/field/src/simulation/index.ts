export * from "./bounce";
export * from "./coverage-report";
export * from "./coverage-simulator";
export * from "./cutting-mode";
export * from "./movement";
export * from "./mowing";
export * from "./robot";
