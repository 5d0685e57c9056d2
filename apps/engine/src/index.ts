export * from "./lib/aggregator";
export * from "./lib/cashFlow";
export * from "./lib/classifier";
export * from "./lib/config";
export * from "./lib/currency";
export * from "./lib/date";
export * from "./lib/errors";
export * from "./lib/ledger";
export * from "./lib/merger";
export * from "./lib/pipeline";
export * from "./lib/reconciliation";
export * from "./lib/reportRows";
export * from "./lib/types";
export * from "./lib/validation";
