export * from "./crypto/canonicalize.js";
export * from "./crypto/hash.js";
export * from "./auth/service-auth.js";
export * from "./auth/caller.js";
export * from "./types/batch.js";
export * from "./types/roles.js";
export * from "./types/audit.js";
export * from "./types/api.js";
