export * from "./read/transaction-reader";
export * from "./write/transaction-writer";
