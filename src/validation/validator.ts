import { MAX_SECTION, MIN_SECTION } from "../extract/contentExtractor.js";
import { isKeyItem, keyItemFor, normalizeItemId, type Whitelist } from "../books/whitelist.js";
import type { GameState } from "../state/types.js";
import { log } from "../utils/logger.js";
import type { PlayerAction, PlayerActionType } from "./parseAction.js";

const validatorLog = log.withScope("validator");

export type VerdictReason =
  | "ok"
  | "empty_action"
  | "must_resolve_combat"
  | "excessive_backtrack"
  | "invalid_exit"
  | "inventory_full"
  | "item_not_found_here"
  | "already_have_item"
  | "item_not_in_inventory"
  | "missing_key"
  | "not_in_combat"
  | "no_luck_remaining"
  | "no_provisions"
  | "stamina_full"
  | "invalid_tool_arguments"
  | "unknown_tool"
  | "game_over";

export interface ValidationVerdict {
  valid: boolean;
  reason: VerdictReason;
  message: string;
}

export interface ValidationContext {
  whitelist: Whitelist;
  backtrackLimit: number;
  /** Exits known for the current section. Empty means unknown. */
  knownExits?: readonly number[];
}

export const COMBAT_ACTIONS: ReadonlySet<PlayerActionType> = new Set(["attack", "flee", "use_item", "test_luck"]);

export const OK: ValidationVerdict = { valid: true, reason: "ok", message: "" };

export function reject(reason: Exclude<VerdictReason, "ok">, message: string): ValidationVerdict {
  return { valid: false, reason, message };
}

function displayItem(item: string): string {
  return item.toLowerCase().replace(/_/g, " ");
}

export function checkCombatGate(state: GameState, type: PlayerActionType): ValidationVerdict {
  if (state.inCombat && !COMBAT_ACTIONS.has(type)) {
    const foe = state.enemy ? `the ${state.enemy.name}` : "your foe";
    return reject(
      "must_resolve_combat",
      `You are locked in combat with ${foe}. You must fight, flee, use an item or test your luck.`,
    );
  }
  return OK;
}

export function checkNavigationTarget(
  state: GameState,
  target: number,
  ctx: Pick<ValidationContext, "backtrackLimit" | "knownExits">,
): ValidationVerdict {
  if (!Number.isInteger(target) || target < MIN_SECTION || target > MAX_SECTION) {
    return reject("invalid_exit", "There is no such way onward.");
  }
  const lowest = Math.min(state.currentSection, ...state.visitedSections);
  if (target < lowest - ctx.backtrackLimit) {
    return reject("excessive_backtrack", "That path lies too far behind you; there is no going back that way now.");
  }
  if (ctx.knownExits && ctx.knownExits.length > 0 && !ctx.knownExits.includes(target)) {
    return reject("invalid_exit", "You see no way to go there from here.");
  }
  return OK;
}

export function checkPickup(state: GameState, rawItem: string, whitelist: Whitelist): ValidationVerdict {
  const item = normalizeItemId(rawItem);
  if (state.inventory.length >= state.inventoryCapacity) {
    return reject("inventory_full", `Your pack is full. You would have to drop something to carry the ${displayItem(item)}.`);
  }
  if (state.inventory.includes(item)) {
    return reject("already_have_item", `You already carry the ${displayItem(item)}.`);
  }
  if (whitelist.isBaseItem(state.bookId, item)) return OK;
  if (!whitelist.allowedItems(state.bookId, state.currentSection).has(item)) {
    return reject(
      "item_not_found_here",
      `You search for the ${displayItem(item)}, but find nothing like it here. Perhaps it lies elsewhere.`,
    );
  }
  return OK;
}

export function checkHeldItem(state: GameState, rawItem: string): ValidationVerdict {
  const item = normalizeItemId(rawItem);
  if (!state.inventory.includes(item)) {
    return reject("item_not_in_inventory", `You do not have the ${displayItem(item)}.`);
  }
  return OK;
}

/** A named key must be carried; otherwise any key will do. */
export function holdsKey(state: GameState): boolean {
  if (state.flags.keyType) return state.inventory.includes(keyItemFor(state.flags.keyType));
  return state.flags.hasKey === true || state.inventory.some(isKeyItem);
}

export function checkDoorGate(state: GameState): ValidationVerdict {
  if (state.flags.doorLocked && !holdsKey(state)) {
    const key = state.flags.keyType ? `a ${state.flags.keyType.toLowerCase()} key` : "a key";
    return reject("missing_key", `The door is locked fast. Without ${key} it will not open.`);
  }
  return OK;
}

/**
 * Decide whether a parsed player action may proceed. Pure: reads the state,
 * never changes it. Rules are checked in priority order and the first
 * rejection wins.
 */
export function validateAction(state: GameState, action: PlayerAction, ctx: ValidationContext): ValidationVerdict {
  const verdict = decide(state, action, ctx);
  if (!verdict.valid) {
    validatorLog.info(`Rejected ${action.type}: ${verdict.reason}`, { section: state.currentSection });
  }
  return verdict;
}

function decide(state: GameState, action: PlayerAction, ctx: ValidationContext): ValidationVerdict {
  if (action.type === "empty") {
    return reject("empty_action", "You hesitate, unsure what to do.");
  }

  const combat = checkCombatGate(state, action.type);
  if (!combat.valid) return combat;

  switch (action.type) {
    case "navigate":
      // Exit membership needs the section text, which is only known after retrieval.
      return action.section === null ? OK : checkNavigationTarget(state, action.section, { backtrackLimit: ctx.backtrackLimit });
    case "pickup":
      return checkPickup(state, action.item, ctx.whitelist);
    case "open_door":
      return checkDoorGate(state);
    case "use_item":
    case "drop":
      return checkHeldItem(state, action.item);
    case "attack":
      if (!state.inCombat && state.flags.enemyDefeated) {
        return reject("not_in_combat", "Your foe already lies defeated. There is nothing left here to fight.");
      }
      return OK;
    case "test_luck":
      return state.stats.luck <= 0
        ? reject("no_luck_remaining", "Your luck has run dry; fortune will not answer you now.")
        : OK;
    case "eat_provision":
      if (state.stats.provisions <= 0) return reject("no_provisions", "You have no provisions left to eat.");
      if (state.stats.stamina >= state.stats.initialStamina) {
        return reject("stamina_full", "You are not hungry; you are already at full strength.");
      }
      return OK;
    case "flee":
    case "test_skill":
    case "talk":
    case "examine":
    case "explore":
      return OK;
  }
}
