export const APP_CONFIG = Symbol("APP_CONFIG");
export const AUDIT_REPOSITORY = Symbol("AUDIT_REPOSITORY");
export const COLD_STORAGE = Symbol("COLD_STORAGE");
export const REMOTE_LIBRARY = Symbol("REMOTE_LIBRARY");
