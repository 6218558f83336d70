import type { BookDefinition } from "../books/bookDefinition.js";
import type { GameState, TerminalVerdict } from "./types.js";

type Endings = Pick<BookDefinition, "victorySections" | "defeatSections">;

/** Death outranks any ending section the player happens to stand on. */
export function checkTerminal(state: GameState, book?: Endings): TerminalVerdict {
  if (state.stats.stamina <= 0 || state.status === "dead") return "defeat";
  if (book?.defeatSections.includes(state.currentSection)) return "defeat";
  if (book?.victorySections.includes(state.currentSection)) return "victory";
  return "continue";
}
