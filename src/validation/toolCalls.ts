import { z } from "zod";
import { normalizeItemId } from "../books/whitelist.js";
import { parseDiceNotation, rollDice, type DiceRoll, type Rng } from "../mechanics/dice.js";
import { STAT_NAMES, STRING_FLAG_NAMES, TOOL_BOOLEAN_FLAGS, type GameState, type Mutation } from "../state/types.js";
import {
  checkCombatGate,
  checkDoorGate,
  checkHeldItem,
  checkNavigationTarget,
  checkPickup,
  OK,
  reject,
  type ValidationContext,
  type ValidationVerdict,
} from "./validator.js";

export const TOOL_NAMES = [
  "update_stat",
  "add_item",
  "remove_item",
  "check_item",
  "attempt_navigation",
  "set_flag",
  "roll_dice",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

const itemArg = z.string().trim().min(1).max(64);

export const toolArgSchemas = {
  update_stat: z.object({
    stat: z.enum(STAT_NAMES),
    delta: z.number().int().min(-20).max(20),
    reason: z.string().optional(),
  }),
  add_item: z.object({ item: itemArg }),
  remove_item: z.object({ item: itemArg }),
  check_item: z.object({ item: itemArg }),
  attempt_navigation: z.object({ section: z.number().int() }),
  set_flag: z.union([
    z.object({ flag: z.enum(TOOL_BOOLEAN_FLAGS), value: z.boolean() }),
    z.object({ flag: z.enum(STRING_FLAG_NAMES), value: z.string().min(1).nullable() }),
  ]),
  roll_dice: z.object({
    dice: z.string().refine((d) => parseDiceNotation(d) !== null, "expected NdM or NdM+X"),
    purpose: z.string().optional(),
  }),
} satisfies Record<ToolName, z.ZodTypeAny>;

export interface ToolCallProposal {
  name: string;
  arguments: unknown;
}

export interface ToolCallOutcome {
  verdict: ValidationVerdict;
  mutations: Mutation[];
  /** Result text returned to the model. */
  message: string;
  roll?: DiceRoll;
}

export interface ToolValidationContext extends ValidationContext {
  rng: Rng;
}

function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((t) => t === name);
}

function rejected(verdict: ValidationVerdict): ToolCallOutcome {
  return { verdict, mutations: [], message: `REJECTED (${verdict.reason}): ${verdict.message}` };
}

function accepted(message: string, mutations: Mutation[] = [], roll?: DiceRoll): ToolCallOutcome {
  return { verdict: OK, mutations, message, roll };
}

/**
 * Treat a model's tool call as an untrusted proposal: check its arguments,
 * then run it through the same rules as a direct player action. Only an
 * accepted outcome carries mutations.
 */
export function validateToolCall(state: GameState, call: ToolCallProposal, ctx: ToolValidationContext): ToolCallOutcome {
  const name = call.name;
  if (!isToolName(name)) {
    return rejected(reject("unknown_tool", `There is no tool called "${name}".`));
  }
  if (state.status !== "active") {
    return rejected(reject("game_over", "The adventure is over; nothing more can change."));
  }
  switch (name) {
    case "update_stat": {
      const args = toolArgSchemas.update_stat.safeParse(call.arguments);
      if (!args.success) return invalidArgs(name, args.error);
      const mutation: Mutation = { kind: "stat_delta", stat: args.data.stat, delta: args.data.delta };
      return accepted(`${args.data.stat.toUpperCase()} ${args.data.delta >= 0 ? "+" : ""}${args.data.delta}`, [mutation]);
    }

    case "add_item": {
      const args = toolArgSchemas.add_item.safeParse(call.arguments);
      if (!args.success) return invalidArgs(name, args.error);
      const item = normalizeItemId(args.data.item);
      const verdict = checkPickup(state, item, ctx.whitelist);
      if (!verdict.valid) return rejected(verdict);
      return accepted(`${item} added to inventory`, [{ kind: "add_item", item }]);
    }

    case "remove_item": {
      const args = toolArgSchemas.remove_item.safeParse(call.arguments);
      if (!args.success) return invalidArgs(name, args.error);
      const item = normalizeItemId(args.data.item);
      const verdict = checkHeldItem(state, item);
      if (!verdict.valid) return rejected(verdict);
      return accepted(`${item} removed from inventory`, [{ kind: "remove_item", item }]);
    }

    case "check_item": {
      const args = toolArgSchemas.check_item.safeParse(call.arguments);
      if (!args.success) return invalidArgs(name, args.error);
      const item = normalizeItemId(args.data.item);
      return accepted(state.inventory.includes(item) ? `The player carries ${item}` : `The player does not carry ${item}`);
    }

    case "attempt_navigation": {
      const args = toolArgSchemas.attempt_navigation.safeParse(call.arguments);
      if (!args.success) return invalidArgs(name, args.error);
      const verdict = checkNavigation(state, args.data.section, ctx);
      if (!verdict.valid) return rejected(verdict);
      return accepted("Navigation accepted", [{ kind: "navigate", section: args.data.section }]);
    }

    case "set_flag": {
      const args = toolArgSchemas.set_flag.safeParse(call.arguments);
      if (!args.success) return invalidArgs(name, args.error);
      const mutation: Mutation = { kind: "set_flag", ...args.data };
      const verdict = checkFlagChange(state, mutation);
      if (!verdict.valid) return rejected(verdict);
      return accepted(`Flag ${args.data.flag} set`, [mutation]);
    }

    case "roll_dice": {
      const args = toolArgSchemas.roll_dice.safeParse(call.arguments);
      if (!args.success) return invalidArgs(name, args.error);
      const roll = rollDice(args.data.dice, ctx.rng);
      return accepted(`Rolled ${roll.notation}: [${roll.rolls.join(", ")}] total ${roll.total}`, [], roll);
    }
  }
}

function invalidArgs(tool: ToolName, error: z.ZodError): ToolCallOutcome {
  const detail = error.issues.map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`).join("; ");
  return rejected(reject("invalid_tool_arguments", `Invalid arguments for ${tool}: ${detail}`));
}

export function checkNavigation(
  state: GameState,
  section: number,
  ctx: Pick<ValidationContext, "backtrackLimit" | "knownExits">,
): ValidationVerdict {
  const combat = checkCombatGate(state, "navigate");
  if (!combat.valid) return combat;
  return checkNavigationTarget(state, section, ctx);
}

function checkFlagChange(state: GameState, mutation: Mutation): ValidationVerdict {
  if (mutation.kind !== "set_flag") return OK;
  if (mutation.flag === "doorOpened" && mutation.value === true) return checkDoorGate(state);
  if (mutation.flag === "doorLocked" && mutation.value === false) return checkDoorGate(state);
  if (mutation.flag === "enemyDefeated" && mutation.value === true && state.inCombat) {
    return reject("must_resolve_combat", "The fight is not over; it ends only when the dice say so.");
  }
  return OK;
}
