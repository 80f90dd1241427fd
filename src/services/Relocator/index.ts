export * from "./Relocator";
export * from "./RelocatorFileSystem";
