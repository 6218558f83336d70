/** Uniform source in [0, 1). Injected so tests can script every roll. */
export type Rng = () => number;

export const ALLOWED_SIDES: ReadonlySet<number> = new Set([4, 6, 8, 10, 12, 20]);
export const MAX_DICE = 10;

export interface DiceRoll {
  notation: string;
  rolls: number[];
  modifier: number;
  total: number;
}

export interface DiceNotation {
  count: number;
  sides: number;
  modifier: number;
}

const NOTATION = /^(\d*)d(\d+)(?:\s*([+-])\s*(\d+))?$/i;

export function parseDiceNotation(notation: string): DiceNotation | null {
  const match = NOTATION.exec(notation.trim());
  if (!match) return null;
  const count = match[1] ? Number.parseInt(match[1], 10) : 1;
  const sides = Number.parseInt(match[2], 10);
  const modifier = match[4] ? Number.parseInt(match[4], 10) * (match[3] === "-" ? -1 : 1) : 0;
  if (count < 1 || count > MAX_DICE || !ALLOWED_SIDES.has(sides)) return null;
  return { count, sides, modifier };
}

export function rollDie(sides: number, rng: Rng): number {
  return Math.floor(rng() * sides) + 1;
}

export function rollDice(notation: string, rng: Rng): DiceRoll {
  const parsed = parseDiceNotation(notation);
  if (!parsed) {
    throw new Error(`Invalid dice notation "${notation}": use NdM or NdM+X with at most ${MAX_DICE} dice`);
  }
  const rolls = Array.from({ length: parsed.count }, () => rollDie(parsed.sides, rng));
  return {
    notation: notation.trim().toLowerCase(),
    rolls,
    modifier: parsed.modifier,
    total: rolls.reduce((sum, r) => sum + r, 0) + parsed.modifier,
  };
}

export interface StatTest {
  roll: DiceRoll;
  target: number;
  success: boolean;
}

/** 2d6 at or under current LUCK. The caller spends one point of LUCK afterwards. */
export function testLuck(luck: number, rng: Rng): StatTest {
  const roll = rollDice("2d6", rng);
  return { roll, target: luck, success: roll.total <= luck };
}

export function testSkill(skill: number, rng: Rng, difficulty = 0): StatTest {
  const roll = rollDice("2d6", rng);
  const target = skill + difficulty;
  return { roll, target, success: roll.total <= target };
}

export type CombatOutcome = "player_hits" | "enemy_hits" | "standoff";

export interface CombatRound {
  playerRoll: DiceRoll;
  enemyRoll: DiceRoll;
  playerAttack: number;
  enemyAttack: number;
  outcome: CombatOutcome;
}

export const COMBAT_DAMAGE = 2;

/** One exchange: each side rolls 2d6 + SKILL, the higher total wounds the other. */
export function combatRound(playerSkill: number, enemySkill: number, rng: Rng): CombatRound {
  const playerRoll = rollDice("2d6", rng);
  const enemyRoll = rollDice("2d6", rng);
  const playerAttack = playerRoll.total + playerSkill;
  const enemyAttack = enemyRoll.total + enemySkill;
  const outcome: CombatOutcome =
    playerAttack > enemyAttack ? "player_hits" : enemyAttack > playerAttack ? "enemy_hits" : "standoff";
  return { playerRoll, enemyRoll, playerAttack, enemyAttack, outcome };
}
