// 公開 API の集約バレル
export * from "./lib/options";

export * from "./lib/core/errors";
export * from "./lib/core/interval";
export * from "./lib/core/address";
export * from "./lib/core/value";
export * from "./lib/core/state";
export * from "./lib/core/state-ops";

export { formatState, printState } from "./lib/analysis/format-state";
export { stateToSections, toDisplay } from "./lib/analysis/state-to-sections";
