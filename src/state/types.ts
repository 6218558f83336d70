export type SessionStatus = "active" | "dead" | "completed";

export interface CharacterStats {
  skill: number;
  stamina: number;
  luck: number;
  gold: number;
  provisions: number;
  initialSkill: number;
  initialStamina: number;
  initialLuck: number;
}

export const STAT_NAMES = ["skill", "stamina", "luck", "gold", "provisions"] as const;

export type StatName = (typeof STAT_NAMES)[number];

/**
 * Named game flags. Every field is optional; an absent flag reads as unset.
 * The section-scoped ones are cleared whenever the player changes section.
 */
export interface GameFlags {
  hasKey?: boolean;
  keyType?: string;
  doorLocked?: boolean;
  doorOpened?: boolean;
  trapDisarmed?: boolean;
  enemyDefeated?: boolean;
  luckTested?: boolean;
  skillTested?: boolean;
  metNpc?: string;
}

export type BooleanFlagName = {
  [K in keyof GameFlags]-?: NonNullable<GameFlags[K]> extends boolean ? K : never;
}[keyof GameFlags];

export type StringFlagName = {
  [K in keyof GameFlags]-?: NonNullable<GameFlags[K]> extends string ? K : never;
}[keyof GameFlags];

/** Boolean flags a tool may set; `hasKey` follows the inventory. */
export const TOOL_BOOLEAN_FLAGS = [
  "doorLocked",
  "doorOpened",
  "trapDisarmed",
  "enemyDefeated",
  "luckTested",
  "skillTested",
] as const satisfies readonly BooleanFlagName[];

export const STRING_FLAG_NAMES = ["keyType", "metNpc"] as const satisfies readonly StringFlagName[];

export const SECTION_SCOPED_FLAGS: readonly (keyof GameFlags)[] = [
  "doorLocked",
  "doorOpened",
  "trapDisarmed",
  "enemyDefeated",
  "luckTested",
  "skillTested",
];

export interface Enemy {
  name: string;
  skill: number;
  stamina: number;
}

export interface GameState {
  bookId: string;
  currentSection: number;
  visitedSections: number[];
  flags: GameFlags;
  stats: CharacterStats;
  inventory: string[];
  inventoryCapacity: number;
  inCombat: boolean;
  enemy: Enemy | null;
  status: SessionStatus;
  turnNumber: number;
}

export type FlagMutation =
  | { kind: "set_flag"; flag: BooleanFlagName; value: boolean }
  | { kind: "set_flag"; flag: StringFlagName; value: string | null };

export type Mutation =
  | { kind: "stat_delta"; stat: StatName; delta: number; raiseCap?: boolean }
  | { kind: "add_item"; item: string }
  | { kind: "remove_item"; item: string }
  | FlagMutation
  | { kind: "navigate"; section: number }
  | { kind: "start_combat"; enemy: Enemy }
  | { kind: "damage_enemy"; amount: number }
  | { kind: "end_combat"; outcome: "victory" | "fled" }
  | { kind: "end_game"; status: "completed" | "dead" };

export type TerminalVerdict = "continue" | "victory" | "defeat";
