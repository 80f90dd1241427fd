export * from "./DuplicateRegistry";
export * from "./DuplicateRegistryMemory";
