// @playsmith/store — artifact index
export { ArtifactIndex } from "./artifact-index.js";
export type { ArtifactIndexOptions } from "./artifact-index.js";
export * from "./db/index.js";
