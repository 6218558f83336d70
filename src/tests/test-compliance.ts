import { expect, test } from "vitest";
import { buildRegenerationNotice, checkCompliance, hasHighSeverity } from "../narrative/compliance.js";

const allowedItems = new Set(["BRONZE_KEY", "PROVISIONS"]);

test("invented items, leaked section numbers and unrolled dice are all reported", () => {
  const issues = checkCompliance("You roll a 6. Beside the BRONZE KEY lies a DRAGON_EGG. Turn to 42 to flee.", {
    allowedItems,
    inventory: ["SWORD"],
    rollCount: 0,
  });
  expect(issues).toEqual([
    { kind: "invented_item", severity: "high", token: "DRAGON_EGG" },
    { kind: "section_leak", severity: "medium", excerpt: "Turn to 42" },
    { kind: "unverified_roll", severity: "low", excerpt: "You roll a 6" },
  ]);
  expect(hasHighSeverity(issues)).toBe(true);
});

test("carried items, game terms and named foes are not flagged", () => {
  const issues = checkCompliance("The ORC snarls. You raise your SWORD; your STAMINA holds and your LUCK with it.", {
    allowedItems,
    inventory: ["SWORD"],
    knownNames: ["Orc"],
    rollCount: 0,
  });
  expect(issues).toEqual([]);
});

test("a dice claim is fine when something was actually rolled", () => {
  const issues = checkCompliance("You rolled 9, just enough.", { allowedItems, inventory: [], rollCount: 1 });
  expect(issues).toEqual([]);
});

test("section leaks alone do not force a rewrite", () => {
  const issues = checkCompliance("A sign reads: paragraph 12.", { allowedItems, inventory: [], rollCount: 0 });
  expect(issues).toEqual([{ kind: "section_leak", severity: "medium", excerpt: "paragraph 12" }]);
  expect(hasHighSeverity(issues)).toBe(false);
});

test("the regeneration notice lists each kind of violation once", () => {
  const notice = buildRegenerationNotice(
    [
      { kind: "invented_item", severity: "high", token: "DRAGON_EGG" },
      { kind: "section_leak", severity: "medium", excerpt: "Turn to 42" },
    ],
    allowedItems,
  );
  expect(notice.split("\n")).toEqual([
    "CORRECTION: your previous draft broke the rules and was discarded.",
    "- It named items that do not exist here: DRAGON_EGG. The only items you may name are: BRONZE_KEY, PROVISIONS.",
    "- It revealed section numbers. Never write section or paragraph numbers.",
    "Write the scene again, obeying every restriction.",
  ]);
});
