export { openDatabase, defaultDatabasePath, integrityCheck, MEMORY_DATABASE } from "./database.js";
export type { SqliteDatabase } from "./database.js";
export { initArtifactSchema, getSchemaVersion, ARTIFACT_SCHEMA_VERSION } from "./schema.js";
