export * from "./auth-provider";
export * from "./credential-resolver";
export * from "./secret-store";
export * from "./secret-value";
