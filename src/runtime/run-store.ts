import type Database from 'better-sqlite3';
import type { PipelineErrorKind } from '../shared/errors.js';
import type { PipelineState, RunRecord, TriggerKind } from './types.js';

interface RunRow {
  id: string;
  workspace_id: string;
  recipe: string;
  trigger: TriggerKind;
  state: PipelineState;
  error_kind: PipelineErrorKind | null;
  error: string | null;
  image_ref: string | null;
  slimmed: number;
  fell_back: number;
  dry_run: number;
  started_at: string;
  ended_at: string | null;
}

function fromRow(row: RunRow): RunRecord {
  return {
    ...row,
    slimmed: row.slimmed === 1,
    fell_back: row.fell_back === 1,
    dry_run: row.dry_run === 1,
  };
}

export interface NewRun {
  id: string;
  workspace_id: string;
  recipe: string;
  trigger: TriggerKind;
  dry_run: boolean;
  started_at: string;
}

export function insertRun(db: Database.Database, run: NewRun): void {
  db.prepare(`
    INSERT INTO runs (id, workspace_id, recipe, trigger, state, dry_run, started_at)
    VALUES (?, ?, ?, ?, 'pending', ?, ?)
  `).run(run.id, run.workspace_id, run.recipe, run.trigger, run.dry_run ? 1 : 0, run.started_at);
}

export function updateRunState(db: Database.Database, runId: string, state: PipelineState): void {
  db.prepare(`UPDATE runs SET state = ? WHERE id = ?`).run(state, runId);
}

export interface RunOutcome {
  state: 'done' | 'failed';
  error_kind: PipelineErrorKind | null;
  error: string | null;
  image_ref: string | null;
  slimmed: boolean;
  fell_back: boolean;
  ended_at: string;
}

export function finishRun(db: Database.Database, runId: string, outcome: RunOutcome): void {
  db.prepare(`
    UPDATE runs
    SET state = ?, error_kind = ?, error = ?, image_ref = ?, slimmed = ?, fell_back = ?, ended_at = ?
    WHERE id = ?
  `).run(
    outcome.state,
    outcome.error_kind,
    outcome.error,
    outcome.image_ref,
    outcome.slimmed ? 1 : 0,
    outcome.fell_back ? 1 : 0,
    outcome.ended_at,
    runId,
  );
}

export function getRun(db: Database.Database, workspaceId: string, runId: string): RunRecord | null {
  const row = db
    .prepare(`SELECT * FROM runs WHERE id = ? AND workspace_id = ?`)
    .get(runId, workspaceId) as RunRow | undefined;
  return row ? fromRow(row) : null;
}

export function listRuns(
  db: Database.Database,
  workspaceId: string,
  limit = 50,
  offset = 0,
): RunRecord[] {
  const rows = db
    .prepare(
      `SELECT * FROM runs WHERE workspace_id = ?
       ORDER BY started_at DESC, rowid DESC LIMIT ? OFFSET ?`,
    )
    .all(workspaceId, limit, offset) as RunRow[];
  return rows.map(fromRow);
}
