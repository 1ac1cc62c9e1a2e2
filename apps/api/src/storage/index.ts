/**
 * Storage Layer - Main Export
 *
 * Pool loaders feed the pipeline; the run report repository keeps one
 * summary per run. Both are plain state containers with no pipeline logic.
 */

export { BaseRepository, getDataDir, getCollectionPath, nowISO, type RepositoryConfig } from "./base.js";
export { InMemoryPoolLoader, JsonPoolLoader, parsePoolRows, type PoolLoader } from "./pools.js";
export { RunReportRepository } from "./runs.js";
