export * from "./keys.js";
export * from "./asset.js";
export * from "./memo.js";
export * from "./claimable-balance.js";
export * from "./ledger-key.js";
export * from "./operations.js";
export * from "./transaction.js";
