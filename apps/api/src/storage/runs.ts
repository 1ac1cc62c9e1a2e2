/**
 * Run Report Repository
 *
 * One summary per generation run: what was asked for, what came out, the
 * generation statistics and the evaluation. Records themselves are not
 * stored here.
 */

import { v4 as uuid } from "uuid";
import { RunReportSchema, type CreateRunReportInput, type RunReport } from "../schemas/index.js";
import { BaseRepository, getCollectionPath, nowISO } from "./base.js";

export class RunReportRepository extends BaseRepository<RunReport> {
  constructor(filePath: string = getCollectionPath("runs")) {
    super({ filePath, schema: RunReportSchema, idField: "run_id" });
  }

  async create(input: CreateRunReportInput): Promise<RunReport> {
    return this._set({ ...input, run_id: uuid(), finished_at: nowISO() });
  }

  /**
   * Most recent runs first
   */
  async recent(limit = 10): Promise<RunReport[]> {
    const all = await this.list();
    return all.sort((a, b) => b.started_at.localeCompare(a.started_at)).slice(0, limit);
  }

  /**
   * Runs that were stopped before reaching the requested count
   */
  async findAborted(): Promise<RunReport[]> {
    return this.list((run) => run.statistics.aborted);
  }

  /**
   * Acceptance ratio and mean overall score across stored runs
   */
  async getSummary(): Promise<{ runs: number; acceptanceRate: number; meanOverall: number }> {
    const runs = await this.list();
    const requested = runs.reduce((sum, r) => sum + r.requested, 0);
    const accepted = runs.reduce((sum, r) => sum + r.accepted, 0);
    const overall = runs.reduce((sum, r) => sum + r.evaluation.direct.overall, 0);
    return {
      runs: runs.length,
      acceptanceRate: requested > 0 ? accepted / requested : 0,
      meanOverall: runs.length > 0 ? overall / runs.length : 0,
    };
  }

  async delete(id: string): Promise<boolean> {
    return this._delete(id);
  }
}
