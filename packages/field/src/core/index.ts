export * from "./algorithms/union-find";
export * from "./data-structures/kd-tree";
export * from "./geometry";
export * from "./grid/grid-model";
export * from "./hash/fnv64";
