export * from "./area/isolated-area";
export * from "./area/obstacles";
export * from "./area/passes";
export * from "./area/sizing";
export * from "./common/finalize";
export * from "./common/initialize-field";
export * from "./guidelines/connect-clusters";
export * from "./guidelines/pass";
export * from "./guidelines/perimeter";
