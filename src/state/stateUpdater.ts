import { isKeyItem, normalizeItemId } from "../books/whitelist.js";
import { StateInvariantError } from "../turn/errors.js";
import { log } from "../utils/logger.js";
import { SECTION_SCOPED_FLAGS, type GameState, type Mutation, type StatName } from "./types.js";

const stateLog = log.withScope("state");

export interface ApplyOptions {
  /** Count this batch as one completed turn. */
  advanceTurn?: boolean;
}

function upperBound(state: GameState, stat: StatName): number {
  switch (stat) {
    case "skill":
      return state.stats.initialSkill;
    case "stamina":
      return state.stats.initialStamina;
    case "luck":
    case "gold":
    case "provisions":
      return Number.POSITIVE_INFINITY;
  }
}

function applyStatDelta(state: GameState, stat: StatName, delta: number, raiseCap: boolean): void {
  if (!Number.isFinite(delta)) {
    throw new StateInvariantError(`Non-numeric delta for ${stat}`);
  }
  const before = state.stats[stat];
  const raw = before + Math.trunc(delta);

  if (raiseCap && raw > upperBound(state, stat)) {
    if (stat === "skill") state.stats.initialSkill = raw;
    if (stat === "stamina") state.stats.initialStamina = raw;
  }

  const clamped = Math.min(Math.max(raw, 0), upperBound(state, stat));
  if (clamped !== raw) {
    stateLog.warn(`Clamped ${stat}`, { before, delta, requested: raw, applied: clamped });
  }
  state.stats[stat] = clamped;
  if (stat === "stamina" && clamped === 0) markDead(state);
}

function markDead(state: GameState): void {
  if (state.status !== "active") return;
  state.status = "dead";
  state.inCombat = false;
  stateLog.info("Stamina exhausted; character has died", { section: state.currentSection });
}

function apply(state: GameState, mutation: Mutation): void {
  switch (mutation.kind) {
    case "stat_delta":
      applyStatDelta(state, mutation.stat, mutation.delta, mutation.raiseCap ?? false);
      return;

    case "add_item": {
      const item = normalizeItemId(mutation.item);
      if (!item) throw new StateInvariantError("Cannot add an item with an empty name");
      if (state.inventory.includes(item)) return;
      if (state.inventory.length >= state.inventoryCapacity) {
        throw new StateInvariantError(`Inventory is full (${state.inventoryCapacity}); cannot add ${item}`);
      }
      state.inventory.push(item);
      if (isKeyItem(item)) state.flags.hasKey = true;
      return;
    }

    case "remove_item": {
      const item = normalizeItemId(mutation.item);
      const index = state.inventory.indexOf(item);
      if (index < 0) throw new StateInvariantError(`Cannot remove ${item}: not in inventory`);
      state.inventory.splice(index, 1);
      if (isKeyItem(item) && !state.inventory.some(isKeyItem)) delete state.flags.hasKey;
      return;
    }

    case "set_flag":
      if (mutation.flag === "keyType" || mutation.flag === "metNpc") {
        if (mutation.value === null) delete state.flags[mutation.flag];
        else state.flags[mutation.flag] = mutation.value;
      } else {
        state.flags[mutation.flag] = mutation.value;
      }
      return;

    case "navigate": {
      if (!Number.isInteger(mutation.section) || mutation.section < 1) {
        throw new StateInvariantError(`Invalid navigation target ${mutation.section}`);
      }
      if (mutation.section === state.currentSection) return;
      for (const flag of SECTION_SCOPED_FLAGS) delete state.flags[flag];
      state.currentSection = mutation.section;
      state.visitedSections.push(mutation.section);
      return;
    }

    case "start_combat":
      state.inCombat = true;
      state.enemy = { ...mutation.enemy };
      return;

    case "damage_enemy":
      if (!state.enemy) throw new StateInvariantError("No enemy to damage");
      state.enemy.stamina = Math.max(0, state.enemy.stamina - Math.max(0, mutation.amount));
      return;

    case "end_combat":
      state.inCombat = false;
      state.enemy = null;
      if (mutation.outcome === "victory") state.flags.enemyDefeated = true;
      return;

    case "end_game":
      state.status = mutation.status;
      state.inCombat = false;
      return;
  }
}

/**
 * Apply a batch of mutations and return the resulting state. The input is
 * never modified; if any mutation is structurally impossible the whole
 * batch is discarded with a StateInvariantError. Once the character dies or
 * the game ends, the rest of the batch is skipped.
 */
export function applyMutations(state: GameState, mutations: readonly Mutation[], opts: ApplyOptions = {}): GameState {
  const next = structuredClone(state);
  if (next.stats.stamina <= 0) markDead(next);

  mutations.forEach((mutation, index) => {
    if (next.status !== "active") {
      stateLog.debug(`Skipped ${mutation.kind} after the game ended`, { status: next.status, index });
      return;
    }
    apply(next, mutation);
  });

  if (opts.advanceTurn) next.turnNumber += 1;

  return next;
}
