import { randomUUID } from "node:crypto";
import type { BookDefinition } from "../books/bookDefinition.js";
import type { Whitelist } from "../books/whitelist.js";
import { rollDice, type Rng } from "../mechanics/dice.js";
import type { NarrativeGenerator } from "../narrative/generator.js";
import type { SectionSearch } from "../retrieval/types.js";
import type { SessionStore, StoredTurn } from "../sessions/sessionStore.js";
import type { CharacterStats, GameState, SessionStatus } from "../state/types.js";
import { log } from "../utils/logger.js";
import {
  SessionClosedError,
  SessionNotFoundError,
  TurnInProgressError,
  UpstreamUnavailableError,
} from "./errors.js";
import { processTurn, type RetrievalSettings, type TurnResult } from "./orchestrator.js";
import { SessionLocks } from "./sessionLocks.js";

const turnLog = log.withScope("turn");

export const RETRY_LATER_MESSAGE = "The story could not continue just now. Please try again.";

export interface TurnServiceDeps {
  store: SessionStore;
  loadBook: (bookId: string) => BookDefinition;
  whitelist: Whitelist;
  search: SectionSearch;
  generator: NarrativeGenerator;
  rng: Rng;
  retrieval: RetrievalSettings;
  backtrackLimit: number;
  /** Attempts per turn when an upstream fails, including the first. */
  maxAttempts: number;
  newSessionId?: () => string;
}

export interface CharacterOverrides {
  skill?: number;
  stamina?: number;
  luck?: number;
}

export interface SessionView {
  sessionId: string;
  bookId: string;
  status: SessionStatus;
  turnNumber: number;
  currentSection: number;
  stats: CharacterStats;
  inventory: string[];
  inCombat: boolean;
  enemy: GameState["enemy"];
}

export interface TurnResponse {
  sessionId: string;
  narrative: string;
  accepted: boolean;
  reason: string;
  stats: CharacterStats;
  inventory: string[];
  currentSection: number;
  gameOver: boolean;
  victory: boolean;
  turnNumber: number;
  status: SessionStatus;
}

function toView(sessionId: string, state: GameState): SessionView {
  return {
    sessionId,
    bookId: state.bookId,
    status: state.status,
    turnNumber: state.turnNumber,
    currentSection: state.currentSection,
    stats: state.stats,
    inventory: state.inventory,
    inCombat: state.inCombat,
    enemy: state.enemy,
  };
}

export class TurnService {
  private readonly locks = new SessionLocks();

  constructor(private readonly deps: TurnServiceDeps) {}

  /** Roll a new adventurer (SKILL 1d6+6, STAMINA 2d6+12, LUCK 1d6+6) and open a session. */
  startSession(bookId: string, overrides: CharacterOverrides = {}): SessionView {
    const book = this.deps.loadBook(bookId);
    const { rng } = this.deps;
    const skill = overrides.skill ?? rollDice("1d6+6", rng).total;
    const stamina = overrides.stamina ?? rollDice("2d6+12", rng).total;
    const luck = overrides.luck ?? rollDice("1d6+6", rng).total;

    const state: GameState = {
      bookId: book.bookId,
      currentSection: book.startSection,
      visitedSections: [book.startSection],
      flags: {},
      stats: {
        skill,
        stamina,
        luck,
        gold: book.startingGold,
        provisions: book.startingProvisions,
        initialSkill: skill,
        initialStamina: stamina,
        initialLuck: luck,
      },
      inventory: [...book.baseItems],
      inventoryCapacity: book.inventoryCapacity,
      inCombat: false,
      enemy: null,
      status: "active",
      turnNumber: 0,
    };

    const sessionId = (this.deps.newSessionId ?? randomUUID)();
    this.deps.store.create(sessionId, state);
    return toView(sessionId, state);
  }

  getSession(sessionId: string): SessionView {
    const stored = this.deps.store.load(sessionId);
    if (!stored) throw new SessionNotFoundError(sessionId);
    return toView(sessionId, stored.state);
  }

  history(sessionId: string): StoredTurn[] {
    if (!this.deps.store.load(sessionId)) throw new SessionNotFoundError(sessionId);
    return this.deps.store.listTurns(sessionId);
  }

  /**
   * Run one turn for a session. Holds the session lock for the whole turn;
   * the new state and its turn record are written together only after the
   * turn has fully succeeded.
   */
  async processTurn(sessionId: string, actionText: string): Promise<TurnResponse> {
    if (!this.locks.tryAcquire(sessionId)) throw new TurnInProgressError(sessionId);
    try {
      const stored = this.deps.store.load(sessionId);
      if (!stored) throw new SessionNotFoundError(sessionId);
      const state = stored.state;
      if (state.status !== "active") throw new SessionClosedError(sessionId, state.status);

      const result = await this.runWithRetries(sessionId, state, actionText);

      this.deps.store.saveTurn(sessionId, result.state, {
        turnNumber: result.state.turnNumber,
        actionText,
        narrative: result.narrative,
        verdictReason: result.verdict.reason,
        sectionBefore: state.currentSection,
        sectionAfter: result.state.currentSection,
        mutations: result.mutations,
        invocations: result.invocations,
        issues: result.issues,
        terminal: result.terminal,
      });

      const next = result.state;
      return {
        sessionId,
        narrative: result.narrative,
        accepted: result.verdict.valid,
        reason: result.verdict.reason,
        stats: next.stats,
        inventory: next.inventory,
        currentSection: next.currentSection,
        gameOver: next.status !== "active",
        victory: result.terminal === "victory",
        turnNumber: next.turnNumber,
        status: next.status,
      };
    } finally {
      this.locks.release(sessionId);
    }
  }

  private async runWithRetries(sessionId: string, state: GameState, actionText: string): Promise<TurnResult> {
    const attempts = Math.max(1, this.deps.maxAttempts);
    const sessionLog = turnLog.child({ sessionId });
    let lastError: UpstreamUnavailableError | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await processTurn(state, actionText, {
          book: this.deps.loadBook(state.bookId),
          whitelist: this.deps.whitelist,
          search: this.deps.search,
          generator: this.deps.generator,
          rng: this.deps.rng,
          retrieval: this.deps.retrieval,
          backtrackLimit: this.deps.backtrackLimit,
        });
      } catch (err) {
        if (!(err instanceof UpstreamUnavailableError)) throw err;
        lastError = err;
        sessionLog.warn(`Turn attempt ${attempt}/${attempts} failed: ${err.message}`, { upstream: err.upstream });
      }
    }

    throw new UpstreamUnavailableError(lastError?.upstream ?? "llm", RETRY_LATER_MESSAGE, lastError);
  }
}
