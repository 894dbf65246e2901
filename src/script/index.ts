export * from "./errors";
export * from "./script-num";
export * from "./read/script-reader";

export * from "./ops/operation";
export * from "./ops/catalog";
export * from "./ops/flow-ops";
export * from "./ops/stack-ops";
export * from "./ops/arithmetic-ops";
export * from "./ops/crypto-ops";

export * from "./eval/execution-context";
export * from "./eval/sighash";
export * from "./eval/script-engine";
export * from "./eval/transaction-verifier";
