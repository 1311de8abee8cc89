export { boundaries, validated } from "./boundaries";
export * from "./consumers";
export { Ledger } from "./ledger";
export { lazyRange, lazyMap } from "./sequences";
