export * from "./accrual";
export * from "./adapters";
export * from "./constants";
export * from "./errors";
export * from "./ledger";
export * from "./store";
export * from "./types";
export * from "./utils";
export * as math from "./utils/math";
