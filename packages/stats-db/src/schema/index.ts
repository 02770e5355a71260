export * from "./github";
export * from "./crates";
export * from "./weekly";
