export const ENGINE_VERSION = "match-engine-v1.0.0"
export const PROFILE_SCHEMA_VERSION = "1.0" as const
