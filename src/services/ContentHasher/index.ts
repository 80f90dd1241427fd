export * from "./ContentHasher";
export * from "./ContentHasherDefault";
