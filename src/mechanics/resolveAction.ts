import type { BookDefinition } from "../books/bookDefinition.js";
import type { GameState, Mutation } from "../state/types.js";
import type { PlayerAction } from "../validation/parseAction.js";
import { COMBAT_DAMAGE, combatRound, testLuck, testSkill, type DiceRoll, type Rng } from "./dice.js";

export const PROVISION_STAMINA = 4;
export const FLEE_DAMAGE = 2;

export interface MechanicsResult {
  mutations: Mutation[];
  /** Facts the narrator must honour, phrased for the prompt. */
  facts: string[];
  rolls: DiceRoll[];
}

const NONE: MechanicsResult = { mutations: [], facts: [], rolls: [] };

function displayItem(item: string): string {
  return item.toLowerCase().replace(/_/g, " ");
}

/**
 * Deterministic consequences of an already-validated player action: dice,
 * combat exchanges, eating, potions, pickups and drops. Numeric navigation
 * is handled by the orchestrator because it needs the section's exits.
 */
export function resolvePlayerAction(
  state: GameState,
  action: PlayerAction,
  book: Pick<BookDefinition, "potions">,
  rng: Rng,
): MechanicsResult {
  switch (action.type) {
    case "attack":
      return resolveAttack(state, rng);
    case "flee":
      if (!state.inCombat) return NONE;
      return {
        mutations: [
          { kind: "stat_delta", stat: "stamina", delta: -FLEE_DAMAGE },
          { kind: "end_combat", outcome: "fled" },
        ],
        facts: [`You escape the fight, but are wounded as you flee: STAMINA -${FLEE_DAMAGE}.`],
        rolls: [],
      };
    case "test_luck": {
      const test = testLuck(state.stats.luck, rng);
      return {
        mutations: [
          { kind: "stat_delta", stat: "luck", delta: -1 },
          { kind: "set_flag", flag: "luckTested", value: true },
        ],
        facts: [
          `Luck test: rolled ${test.roll.total} against LUCK ${test.target}. ${test.success ? "You are lucky." : "You are unlucky."} LUCK is reduced by 1.`,
        ],
        rolls: [test.roll],
      };
    }
    case "test_skill": {
      const test = testSkill(state.stats.skill, rng);
      return {
        mutations: [{ kind: "set_flag", flag: "skillTested", value: true }],
        facts: [
          `Skill test: rolled ${test.roll.total} against SKILL ${test.target}. ${test.success ? "You succeed." : "You fail."}`,
        ],
        rolls: [test.roll],
      };
    }
    case "eat_provision":
      return eatProvision(state);
    case "use_item": {
      if (action.item === "PROVISIONS") return eatProvision(state);
      const potion = book.potions.get(action.item);
      if (!potion) return NONE;
      return {
        mutations: [
          { kind: "stat_delta", stat: potion.stat, delta: potion.amount },
          { kind: "remove_item", item: action.item },
        ],
        facts: [`You drink the ${displayItem(action.item)}: ${potion.stat.toUpperCase()} +${potion.amount} (never above its starting value).`],
        rolls: [],
      };
    }
    case "pickup":
      return {
        mutations: [{ kind: "add_item", item: action.item }],
        facts: [`You take the ${displayItem(action.item)}.`],
        rolls: [],
      };
    case "drop":
      return {
        mutations: [{ kind: "remove_item", item: action.item }],
        facts: [`You leave the ${displayItem(action.item)} behind.`],
        rolls: [],
      };
    case "empty":
    case "navigate":
    case "open_door":
    case "talk":
    case "examine":
    case "explore":
      return NONE;
  }
}

function eatProvision(state: GameState): MechanicsResult {
  const gain = Math.min(PROVISION_STAMINA, Math.max(0, state.stats.initialStamina - state.stats.stamina));
  return {
    mutations: [
      { kind: "stat_delta", stat: "stamina", delta: gain },
      { kind: "stat_delta", stat: "provisions", delta: -1 },
    ],
    facts: [`You eat a meal from your provisions and recover ${gain} STAMINA.`],
    rolls: [],
  };
}

function resolveAttack(state: GameState, rng: Rng): MechanicsResult {
  const enemy = state.enemy;
  if (!state.inCombat || !enemy) {
    return { mutations: [], facts: ["There is no enemy here to fight."], rolls: [] };
  }

  const round = combatRound(state.stats.skill, enemy.skill, rng);
  const header = `Attack round against the ${enemy.name}: your attack strength ${round.playerAttack}, theirs ${round.enemyAttack}.`;
  const rolls = [round.playerRoll, round.enemyRoll];

  switch (round.outcome) {
    case "player_hits": {
      const remaining = Math.max(0, enemy.stamina - COMBAT_DAMAGE);
      const mutations: Mutation[] = [{ kind: "damage_enemy", amount: COMBAT_DAMAGE }];
      if (remaining === 0) mutations.push({ kind: "end_combat", outcome: "victory" });
      return {
        mutations,
        facts: [
          header,
          remaining === 0
            ? `You wound the ${enemy.name} for ${COMBAT_DAMAGE} STAMINA. It falls, defeated.`
            : `You wound the ${enemy.name} for ${COMBAT_DAMAGE} STAMINA; it has ${remaining} left.`,
        ],
        rolls,
      };
    }
    case "enemy_hits":
      return {
        mutations: [{ kind: "stat_delta", stat: "stamina", delta: -COMBAT_DAMAGE }],
        facts: [header, `The ${enemy.name} wounds you: STAMINA -${COMBAT_DAMAGE}.`],
        rolls,
      };
    case "standoff":
      return { mutations: [], facts: [header, "Your blows are parried; neither of you is hurt."], rolls };
  }
}
