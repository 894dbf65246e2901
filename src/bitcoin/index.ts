export * from "./address";
export * from "./network";
export * from "./op-codes";
export * from "./sig-hash-type";
export * from "./transaction";
export * from "./transaction-input";
export * from "./transaction-output";
export * from "./utxo-set";
