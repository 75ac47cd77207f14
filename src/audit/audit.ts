import { createHash } from 'node:crypto';
import { appendFileSync } from 'node:fs';
import type Database from 'better-sqlite3';
import { generateId } from '../shared/ids.js';
import { errorMessage } from '../shared/errors.js';
import { jsonHash } from '../shared/redact.js';
import { logger } from '../shared/logger.js';
import type { PipelineState } from '../runtime/types.js';

/** One state transition of one run. Inputs are hashed, never stored raw. */
export interface AuditEntry {
  id: string;
  timestamp: string;
  actor: string;
  workspace_id: string;
  run_id: string;
  from_state: PipelineState;
  to_state: PipelineState;
  input_hash: string;
  error_kind: string | null;
  dry_run: boolean;
  chain_prev_hash: string | null;
  chain_this_hash: string;
}

export interface AuditEntryInput {
  actor: string;
  workspace_id: string;
  run_id: string;
  from_state: PipelineState;
  to_state: PipelineState;
  input: unknown;
  error_kind?: string;
  dry_run?: boolean;
}

interface AuditRow extends Omit<AuditEntry, 'dry_run'> {
  dry_run: number;
}

function getLastAuditHash(db: Database.Database, workspaceId: string): string | null {
  const row = db
    .prepare(
      `SELECT chain_this_hash FROM audit_log WHERE workspace_id = ?
       ORDER BY seq DESC LIMIT 1`,
    )
    .get(workspaceId) as { chain_this_hash: string } | undefined;
  return row?.chain_this_hash ?? null;
}

function computeEntryHash(entry: Omit<AuditEntry, 'chain_this_hash'>): string {
  const canonical = JSON.stringify({
    id: entry.id,
    timestamp: entry.timestamp,
    actor: entry.actor,
    workspace_id: entry.workspace_id,
    run_id: entry.run_id,
    from_state: entry.from_state,
    to_state: entry.to_state,
    input_hash: entry.input_hash,
    error_kind: entry.error_kind,
    dry_run: entry.dry_run,
    chain_prev_hash: entry.chain_prev_hash,
  });
  return createHash('sha256').update(canonical).digest('hex');
}

export function appendAuditEntry(
  db: Database.Database,
  auditLogPath: string | null,
  input: AuditEntryInput,
): AuditEntry {
  const partial: Omit<AuditEntry, 'chain_this_hash'> = {
    id: generateId(),
    timestamp: new Date().toISOString(),
    actor: input.actor,
    workspace_id: input.workspace_id,
    run_id: input.run_id,
    from_state: input.from_state,
    to_state: input.to_state,
    input_hash: jsonHash(input.input),
    error_kind: input.error_kind ?? null,
    dry_run: input.dry_run ?? false,
    chain_prev_hash: getLastAuditHash(db, input.workspace_id),
  };
  const entry: AuditEntry = { ...partial, chain_this_hash: computeEntryHash(partial) };

  db.prepare(`
    INSERT INTO audit_log
      (id, timestamp, actor, workspace_id, run_id, from_state, to_state,
       input_hash, error_kind, dry_run, chain_prev_hash, chain_this_hash)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    entry.id,
    entry.timestamp,
    entry.actor,
    entry.workspace_id,
    entry.run_id,
    entry.from_state,
    entry.to_state,
    entry.input_hash,
    entry.error_kind,
    entry.dry_run ? 1 : 0,
    entry.chain_prev_hash,
    entry.chain_this_hash,
  );

  // Line-delimited mirror; the DB is the source of truth
  if (auditLogPath) {
    try {
      appendFileSync(auditLogPath, JSON.stringify(entry) + '\n', 'utf8');
    } catch (err) {
      logger.warn('Could not append to audit log file', { path: auditLogPath, error: errorMessage(err) });
    }
  }

  return entry;
}

function fromRow(row: AuditRow): AuditEntry {
  return { ...row, dry_run: row.dry_run === 1 };
}

export function listRunEvents(db: Database.Database, runId: string): AuditEntry[] {
  const rows = db
    .prepare(
      `SELECT id, timestamp, actor, workspace_id, run_id, from_state, to_state, input_hash,
              error_kind, dry_run, chain_prev_hash, chain_this_hash
       FROM audit_log WHERE run_id = ? ORDER BY seq ASC`,
    )
    .all(runId) as AuditRow[];
  return rows.map(fromRow);
}

export interface ChainVerification {
  valid: boolean;
  entries: number;
  /** ID of the first entry whose hash or back-link does not match. */
  broken_at?: string;
}

export function verifyAuditChain(db: Database.Database, workspaceId: string): ChainVerification {
  const rows = db
    .prepare(
      `SELECT id, timestamp, actor, workspace_id, run_id, from_state, to_state, input_hash,
              error_kind, dry_run, chain_prev_hash, chain_this_hash
       FROM audit_log WHERE workspace_id = ? ORDER BY seq ASC`,
    )
    .all(workspaceId) as AuditRow[];

  let prev: string | null = null;
  for (const row of rows) {
    const entry = fromRow(row);
    const { chain_this_hash, ...rest } = entry;
    if (entry.chain_prev_hash !== prev || computeEntryHash(rest) !== chain_this_hash) {
      return { valid: false, entries: rows.length, broken_at: entry.id };
    }
    prev = chain_this_hash;
  }
  return { valid: true, entries: rows.length };
}
