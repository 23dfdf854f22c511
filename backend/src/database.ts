import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from './errors.js';
import { createLogger, NAMESPACES } from './logging.js';

export type SqliteDatabase = Database.Database;

const log = createLogger(NAMESPACES.stores.conversation);

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS Agents (
    id TEXT PRIMARY KEY,
    storyRef TEXT NOT NULL DEFAULT '',
    characterRef TEXT NOT NULL DEFAULT '',
    characterName TEXT NOT NULL DEFAULT '',
    personality TEXT NOT NULL DEFAULT '',
    heldEvidenceIds TEXT NOT NULL DEFAULT '[]',
    knownLocationIds TEXT NOT NULL DEFAULT '[]',
    createdAt TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS Turns (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    agentId TEXT NOT NULL,
    turnIndex INTEGER NOT NULL,
    role TEXT NOT NULL,
    fullText TEXT NOT NULL,
    clientText TEXT NOT NULL DEFAULT '',
    revealedEvidenceIds TEXT NOT NULL DEFAULT '[]',
    revealedLocationIds TEXT NOT NULL DEFAULT '[]',
    tokenCount INTEGER NOT NULL DEFAULT 0,
    timestamp TEXT NOT NULL,
    FOREIGN KEY (agentId) REFERENCES Agents(id) ON DELETE CASCADE,
    UNIQUE(agentId, turnIndex)
  );

  CREATE INDEX IF NOT EXISTS idx_turns_agent_timestamp ON Turns(agentId, timestamp);

  CREATE TABLE IF NOT EXISTS Stories (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    data TEXT NOT NULL,
    createdAt TEXT NOT NULL,
    updatedAt TEXT NOT NULL
  );
`;

/**
 * Open (or create) the engine database and make sure the schema exists.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== ':memory:') {
    // Ensure parent directories exist to avoid disk I/O errors
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);

  // Enable foreign key constraints (required for CASCADE deletes to work)
  db.pragma('foreign_keys = ON');

  // Enable WAL mode for better concurrency; fall back quietly if unavailable (e.g., sandboxed test FS)
  if (dbPath !== ':memory:') {
    try {
      db.pragma('journal_mode = WAL');
    } catch (e) {
      log('Failed to enable WAL, continuing with default mode: %s', errorMessage(e));
    }
  }

  db.exec(SCHEMA);
  return db;
}
