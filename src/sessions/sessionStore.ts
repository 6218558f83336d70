import type Database from "better-sqlite3";
import { z } from "zod";
import type { GameState, Mutation, SessionStatus } from "../state/types.js";
import { log } from "../utils/logger.js";

const dbLog = log.withScope("db");

export type SessionRow = {
  session_id: string;
  book_id: string;
  status: SessionStatus;
  turn_number: number;
  state_json: string;
  created_at_ms: number;
  updated_at_ms: number;
};

export type TurnLogEntry = {
  sessionId: string;
  turnNumber: number;
  actionText: string;
  narrative: string;
  verdictReason: string;
  sectionBefore: number;
  sectionAfter: number;
  mutations: readonly Mutation[];
  invocations: readonly unknown[];
  issues: readonly unknown[];
  terminal: string;
  createdAtMs: number;
};

/** A turn record as read back; the JSON columns are not re-validated. */
export type StoredTurn = Omit<TurnLogEntry, "mutations" | "invocations" | "issues"> & {
  mutations: unknown[];
  invocations: unknown[];
  issues: unknown[];
};

const jsonArray = z.array(z.unknown());

type TurnLogRow = {
  session_id: string;
  turn_number: number;
  action_text: string;
  narrative: string;
  verdict_reason: string;
  section_before: number;
  section_after: number;
  mutations_json: string;
  invocations_json: string;
  issues_json: string;
  terminal: string;
  created_at_ms: number;
};

const statsSchema = z.object({
  skill: z.number().int().min(0),
  stamina: z.number().int().min(0),
  luck: z.number().int().min(0),
  gold: z.number().int().min(0),
  provisions: z.number().int().min(0),
  initialSkill: z.number().int().min(0),
  initialStamina: z.number().int().min(0),
  initialLuck: z.number().int().min(0),
});

const flagsSchema = z.object({
  hasKey: z.boolean().optional(),
  keyType: z.string().optional(),
  doorLocked: z.boolean().optional(),
  doorOpened: z.boolean().optional(),
  trapDisarmed: z.boolean().optional(),
  enemyDefeated: z.boolean().optional(),
  luckTested: z.boolean().optional(),
  skillTested: z.boolean().optional(),
  metNpc: z.string().optional(),
});

export const gameStateSchema = z.object({
  bookId: z.string().min(1),
  currentSection: z.number().int().positive(),
  visitedSections: z.array(z.number().int().positive()),
  flags: flagsSchema,
  stats: statsSchema,
  inventory: z.array(z.string()),
  inventoryCapacity: z.number().int().positive(),
  inCombat: z.boolean(),
  enemy: z.object({ name: z.string(), skill: z.number().int(), stamina: z.number().int() }).nullable(),
  status: z.enum(["active", "dead", "completed"]),
  turnNumber: z.number().int().min(0),
});

export interface StoredSession {
  sessionId: string;
  state: GameState;
  createdAtMs: number;
  updatedAtMs: number;
}

export interface SessionStore {
  create(sessionId: string, state: GameState): StoredSession;
  load(sessionId: string): StoredSession | null;
  /** Persist the new state and its turn record together, or neither. */
  saveTurn(sessionId: string, state: GameState, entry: Omit<TurnLogEntry, "sessionId" | "createdAtMs">): void;
  listTurns(sessionId: string): StoredTurn[];
}

export class SqliteSessionStore implements SessionStore {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => number = Date.now,
  ) {}

  create(sessionId: string, state: GameState): StoredSession {
    const now = this.now();
    this.db
      .prepare(
        `INSERT INTO game_sessions (session_id, book_id, status, turn_number, state_json, created_at_ms, updated_at_ms)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(sessionId, state.bookId, state.status, state.turnNumber, JSON.stringify(state), now, now);
    dbLog.info(`Created session ${sessionId}`, { bookId: state.bookId });
    return { sessionId, state, createdAtMs: now, updatedAtMs: now };
  }

  load(sessionId: string): StoredSession | null {
    const row = this.db.prepare("SELECT * FROM game_sessions WHERE session_id = ?").get(sessionId) as
      | SessionRow
      | undefined;
    if (!row) return null;

    const parsed = gameStateSchema.safeParse(JSON.parse(row.state_json));
    if (!parsed.success) {
      throw new Error(`Stored state for session ${sessionId} is corrupt: ${parsed.error.message}`);
    }
    return {
      sessionId: row.session_id,
      state: parsed.data,
      createdAtMs: row.created_at_ms,
      updatedAtMs: row.updated_at_ms,
    };
  }

  saveTurn(sessionId: string, state: GameState, entry: Omit<TurnLogEntry, "sessionId" | "createdAtMs">): void {
    const now = this.now();
    const updateSession = this.db.prepare(
      `UPDATE game_sessions SET status = ?, turn_number = ?, state_json = ?, updated_at_ms = ? WHERE session_id = ?`,
    );
    const insertTurn = this.db.prepare(
      `INSERT INTO turn_log (session_id, turn_number, action_text, narrative, verdict_reason, section_before,
         section_after, mutations_json, invocations_json, issues_json, terminal, created_at_ms)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );

    const tx = this.db.transaction(() => {
      const result = updateSession.run(state.status, state.turnNumber, JSON.stringify(state), now, sessionId);
      if (result.changes !== 1) throw new Error(`Session ${sessionId} disappeared while saving`);
      insertTurn.run(
        sessionId,
        entry.turnNumber,
        entry.actionText,
        entry.narrative,
        entry.verdictReason,
        entry.sectionBefore,
        entry.sectionAfter,
        JSON.stringify(entry.mutations),
        JSON.stringify(entry.invocations),
        JSON.stringify(entry.issues),
        entry.terminal,
        now,
      );
    });
    tx();
  }

  listTurns(sessionId: string): StoredTurn[] {
    const rows = this.db
      .prepare("SELECT * FROM turn_log WHERE session_id = ? ORDER BY id ASC")
      .all(sessionId) as TurnLogRow[];
    return rows.map((row) => ({
      sessionId: row.session_id,
      turnNumber: row.turn_number,
      actionText: row.action_text,
      narrative: row.narrative,
      verdictReason: row.verdict_reason,
      sectionBefore: row.section_before,
      sectionAfter: row.section_after,
      mutations: jsonArray.parse(JSON.parse(row.mutations_json)),
      invocations: jsonArray.parse(JSON.parse(row.invocations_json)),
      issues: jsonArray.parse(JSON.parse(row.issues_json)),
      terminal: row.terminal,
      createdAtMs: row.created_at_ms,
    }));
  }
}
