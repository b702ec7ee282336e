import type { Issue, IssueType } from '../../types/index.js';
import { NotFoundError } from '../../utils/errors.js';
import type { Queryable } from './db.js';
import type { IssuePatch, IssueRepository, NewIssue } from './types.js';
import { toIssue } from './rows.js';
import type { IssueRow } from './rows.js';

const COLUMNS = `id, page_id, scan_run_id, type, severity, status, title, description, evidence,
  occurrence_count, first_seen_at, last_seen_at, acknowledged_at, acknowledged_by, resolved_at,
  ai_confirmed, ai_confidence, ai_reasoning, ai_explanation, ai_suggested_fix, ai_verified_at`;

const ACTIVE = `status IN ('open', 'acknowledged')`;

const PATCH_COLUMNS: Record<keyof IssuePatch, string> = {
  scanRunId: 'scan_run_id',
  severity: 'severity',
  status: 'status',
  title: 'title',
  description: 'description',
  evidence: 'evidence',
  occurrenceCount: 'occurrence_count',
  lastSeenAt: 'last_seen_at',
  acknowledgedAt: 'acknowledged_at',
  acknowledgedBy: 'acknowledged_by',
  resolvedAt: 'resolved_at',
  aiConfirmed: 'ai_confirmed',
  aiConfidence: 'ai_confidence',
  aiReasoning: 'ai_reasoning',
  aiExplanation: 'ai_explanation',
  aiSuggestedFix: 'ai_suggested_fix',
  aiVerifiedAt: 'ai_verified_at',
};

function isPatchKey(key: string): key is keyof IssuePatch {
  return Object.hasOwn(PATCH_COLUMNS, key);
}

export function createIssueRepository(db: Queryable): IssueRepository {
  async function findById(issueId: string): Promise<Issue | null> {
    const { rows } = await db.query<IssueRow>(`SELECT ${COLUMNS} FROM issues WHERE id = $1`, [issueId]);
    return rows[0] ? toIssue(rows[0]) : null;
  }

  return {
    findById,

    async findActive(pageId: string, type: IssueType): Promise<Issue | null> {
      const { rows } = await db.query<IssueRow>(
        `SELECT ${COLUMNS} FROM issues WHERE page_id = $1 AND type = $2 AND ${ACTIVE}`,
        [pageId, type],
      );
      return rows[0] ? toIssue(rows[0]) : null;
    },

    async listActive(pageId: string): Promise<Issue[]> {
      const { rows } = await db.query<IssueRow>(
        `SELECT ${COLUMNS} FROM issues WHERE page_id = $1 AND ${ACTIVE} ORDER BY first_seen_at`,
        [pageId],
      );
      return rows.map(toIssue);
    },

    async create(input: NewIssue): Promise<Issue> {
      const { rows } = await db.query<IssueRow>(
        `INSERT INTO issues (
           page_id, scan_run_id, type, severity, status, title, description, evidence,
           occurrence_count, first_seen_at, last_seen_at,
           ai_confirmed, ai_confidence, ai_reasoning, ai_explanation, ai_suggested_fix, ai_verified_at
         ) VALUES ($1, $2, $3, $4, 'open', $5, $6, $7, 1, $8, $8, $9, $10, $11, $12, $13, $14)
         RETURNING ${COLUMNS}`,
        [
          input.pageId,
          input.scanRunId,
          input.type,
          input.severity,
          input.title,
          input.description,
          JSON.stringify(input.evidence),
          input.at,
          input.aiConfirmed ?? null,
          input.aiConfidence ?? null,
          input.aiReasoning ?? null,
          input.aiExplanation ?? null,
          input.aiSuggestedFix ?? null,
          input.aiVerifiedAt ?? null,
        ],
      );
      return toIssue(rows[0]);
    },

    async update(issueId: string, patch: IssuePatch): Promise<Issue> {
      const sets: string[] = [];
      const params: unknown[] = [issueId];

      for (const [key, value] of Object.entries(patch)) {
        if (!isPatchKey(key) || value === undefined) continue;
        params.push(key === 'evidence' ? JSON.stringify(value) : value);
        sets.push(`${PATCH_COLUMNS[key]} = $${params.length}`);
      }

      if (sets.length === 0) {
        const current = await findById(issueId);
        if (!current) throw new NotFoundError('Issue', issueId);
        return current;
      }

      const { rows } = await db.query<IssueRow>(
        `UPDATE issues SET ${sets.join(', ')}, updated_at = NOW() WHERE id = $1 RETURNING ${COLUMNS}`,
        params,
      );
      if (!rows[0]) throw new NotFoundError('Issue', issueId);
      return toIssue(rows[0]);
    },
  };
}
