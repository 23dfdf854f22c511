import { randomUUID } from 'crypto';
import { SqliteDatabase } from '../database.js';
import { ConversationLog, NewAgentRecord } from '../interfaces/ConversationLog.js';
import { AgentRecord, PersistedTurn, Turn, TurnRole } from '../types/Agent.js';
import { countTokens } from '../utils/tokenCounter.js';
import { createLogger, NAMESPACES } from '../logging.js';

interface AgentRow {
  id: string;
  storyRef: string;
  characterRef: string;
  characterName: string;
  personality: string;
  heldEvidenceIds: string;
  knownLocationIds: string;
  createdAt: string;
}

interface TurnRow {
  agentId: string;
  turnIndex: number;
  role: string;
  fullText: string;
  clientText: string;
  revealedEvidenceIds: string;
  revealedLocationIds: string;
  tokenCount: number;
  timestamp: string;
}

const TURN_ROLES: readonly TurnRole[] = ['instruction', 'user', 'character'];

function isTurnRole(value: string): value is TurnRole {
  return TURN_ROLES.some(role => role === value);
}

export function parseIdList(raw: string | null | undefined): string[] {
  if (!raw) return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((id): id is string => typeof id === 'string') : [];
  } catch {
    return [];
  }
}

function toRecord(row: AgentRow): AgentRecord {
  return {
    id: row.id,
    storyRef: row.storyRef,
    characterRef: row.characterRef,
    characterName: row.characterName,
    personality: row.personality,
    heldEvidenceIds: parseIdList(row.heldEvidenceIds),
    knownLocationIds: parseIdList(row.knownLocationIds),
    createdAt: row.createdAt
  };
}

/**
 * better-sqlite3 implementation of the durable conversation log.
 */
export class SqliteConversationLog implements ConversationLog {
  private readonly log = createLogger(NAMESPACES.stores.conversation);

  constructor(private readonly db: SqliteDatabase) {}

  async createAgent(record: NewAgentRecord): Promise<AgentRecord> {
    const created: AgentRecord = { ...record, id: randomUUID(), createdAt: new Date().toISOString() };
    this.db.prepare(
      `INSERT INTO Agents (id, storyRef, characterRef, characterName, personality, heldEvidenceIds, knownLocationIds, createdAt)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    ).run(
      created.id,
      created.storyRef,
      created.characterRef,
      created.characterName,
      created.personality,
      JSON.stringify(created.heldEvidenceIds),
      JSON.stringify(created.knownLocationIds),
      created.createdAt
    );
    this.log('[AGENT_CREATE] id=%s character=%s story=%s', created.id, created.characterRef, created.storyRef);
    return created;
  }

  async getAgent(agentId: string): Promise<AgentRecord | null> {
    const row = this.db.prepare<[string], AgentRow>('SELECT * FROM Agents WHERE id = ?').get(agentId);
    return row ? toRecord(row) : null;
  }

  async appendTurn(agentId: string, turn: Turn): Promise<void> {
    this.insertTurn(agentId, turn);
  }

  async listTurns(agentId: string): Promise<PersistedTurn[]> {
    const rows = this.db
      .prepare<[string], TurnRow>('SELECT * FROM Turns WHERE agentId = ? ORDER BY turnIndex ASC')
      .all(agentId);
    const turns: PersistedTurn[] = [];
    for (const row of rows) {
      if (!isTurnRole(row.role)) {
        this.log('[TURNS] skipping row with unknown role=%s agent=%s index=%d', row.role, agentId, row.turnIndex);
        continue;
      }
      turns.push({
        agentId: row.agentId,
        index: row.turnIndex,
        role: row.role,
        fullText: row.fullText,
        clientText: row.clientText,
        revealedEvidenceIds: parseIdList(row.revealedEvidenceIds),
        revealedLocationIds: parseIdList(row.revealedLocationIds),
        tokenCount: row.tokenCount,
        timestamp: row.timestamp
      });
    }
    return turns;
  }

  async replaceTurns(agentId: string, turns: readonly Turn[]): Promise<void> {
    const replace = this.db.transaction((replacement: readonly Turn[]) => {
      this.db.prepare('DELETE FROM Turns WHERE agentId = ?').run(agentId);
      for (const turn of replacement) this.insertTurn(agentId, turn);
    });
    replace(turns);
    this.log('[TURNS] replaced history agent=%s count=%d', agentId, turns.length);
  }

  async listRecentlyActiveAgentIds(sinceIso: string, limit: number): Promise<string[]> {
    const rows = this.db
      .prepare<[string, number], { agentId: string }>(
        `SELECT Turns.agentId AS agentId, MAX(Turns.timestamp) AS lastActive
         FROM Turns JOIN Agents ON Agents.id = Turns.agentId
         WHERE Turns.timestamp >= ?
         GROUP BY Turns.agentId
         ORDER BY lastActive DESC
         LIMIT ?`
      )
      .all(sinceIso, limit);
    return rows.map(row => row.agentId);
  }

  private insertTurn(agentId: string, turn: Turn): void {
    this.db.prepare(
      `INSERT INTO Turns (agentId, turnIndex, role, fullText, clientText, revealedEvidenceIds, revealedLocationIds, tokenCount, timestamp)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
    ).run(
      agentId,
      turn.index,
      turn.role,
      turn.fullText,
      turn.clientText,
      JSON.stringify(turn.revealedEvidenceIds),
      JSON.stringify(turn.revealedLocationIds),
      countTokens(turn.fullText),
      turn.timestamp
    );
  }
}
