import { STAT_NAMES, STRING_FLAG_NAMES, TOOL_BOOLEAN_FLAGS } from "../state/types.js";
import type { ToolName } from "../validation/toolCalls.js";
import type { ToolSpec } from "./model.js";

const itemParam = {
  type: "object",
  properties: { item: { type: "string", description: "Item name in capitals, e.g. BRONZE_KEY" } },
  required: ["item"],
  additionalProperties: false,
};

/** JSON-schema descriptions sent to the model. Arguments are re-checked with zod on the way back. */
export const NARRATOR_TOOLS: readonly (ToolSpec & { name: ToolName })[] = [
  {
    name: "update_stat",
    description: "Change one of the player's stats by a relative amount.",
    parameters: {
      type: "object",
      properties: {
        stat: { type: "string", enum: [...STAT_NAMES] },
        delta: { type: "integer", minimum: -20, maximum: 20 },
        reason: { type: "string" },
      },
      required: ["stat", "delta"],
      additionalProperties: false,
    },
  },
  { name: "add_item", description: "Give the player an item present in this section.", parameters: itemParam },
  { name: "remove_item", description: "Take an item the player carries out of their inventory.", parameters: itemParam },
  { name: "check_item", description: "Ask whether the player carries an item.", parameters: itemParam },
  {
    name: "attempt_navigation",
    description: "Move the player along one of the listed paths.",
    parameters: {
      type: "object",
      properties: { section: { type: "integer" } },
      required: ["section"],
      additionalProperties: false,
    },
  },
  {
    name: "set_flag",
    description: "Record a fact about the adventure.",
    parameters: {
      type: "object",
      properties: {
        flag: { type: "string", enum: [...TOOL_BOOLEAN_FLAGS, ...STRING_FLAG_NAMES] },
        value: { type: ["boolean", "string", "null"] },
      },
      required: ["flag", "value"],
      additionalProperties: false,
    },
  },
  {
    name: "roll_dice",
    description: "Roll dice in NdM or NdM+X notation (at most 10 dice; d4, d6, d8, d10, d12 or d20).",
    parameters: {
      type: "object",
      properties: { dice: { type: "string" }, purpose: { type: "string" } },
      required: ["dice"],
      additionalProperties: false,
    },
  },
];
