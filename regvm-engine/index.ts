// 公開 API の集約バレル
export * from "./lib/execution/execute";
export { stateToSnapshot } from "./lib/execution/snapshot";

export * from "./lib/core/state";
export * from "./lib/core/state-ops";
export * from "./lib/core/word";
export * from "./lib/core/faults";

export * from "./lib/semantics";
export * from "./lib/options";
