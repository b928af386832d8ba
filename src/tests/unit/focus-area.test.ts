import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { fallbackFocusAreas, nextFocusArea } from "../../assessment/focus-area.policy";
import { FocusArea } from "../../shared/types/assessment.types";

const ts: FocusArea = { kind: "tech_stack", name: "TypeScript" };
const react: FocusArea = { kind: "tech_stack", name: "React" };
const stack = ["TypeScript", "React"];

describe("nextFocusArea", () => {
  it("walks the tech stack round-robin", () => {
    assert.deepEqual(nextFocusArea(stack, [], "default"), ts);
    assert.deepEqual(nextFocusArea(stack, [ts], "default"), react);
    assert.deepEqual(nextFocusArea(stack, [ts, react], "default"), ts);
    assert.deepEqual(nextFocusArea(stack, [ts, react, ts], "default"), react);
  });

  it("matches stack entries case-insensitively", () => {
    assert.deepEqual(nextFocusArea(stack, [{ kind: "tech_stack", name: "typescript" }], "default"), react);
  });

  it("rotates general categories once each entry has two questions", () => {
    const covered = [ts, react, ts, react];
    assert.deepEqual(nextFocusArea(stack, covered, "default"), { kind: "general", name: "architecture" });
    assert.deepEqual(
      nextFocusArea(stack, [...covered, { kind: "general", name: "architecture" }], "default"),
      { kind: "general", name: "debugging" },
    );
  });

  it("uses the persona's rotation order", () => {
    const covered = [ts, react, ts, react];
    assert.deepEqual(nextFocusArea(stack, covered, "analytical"), { kind: "general", name: "algorithms" });
    assert.deepEqual(nextFocusArea(stack, covered, "creative"), { kind: "general", name: "best-practices" });
  });

  it("wraps around the rotation", () => {
    const generals: FocusArea[] = [
      { kind: "general", name: "architecture" },
      { kind: "general", name: "debugging" },
      { kind: "general", name: "best-practices" },
    ];
    assert.deepEqual(nextFocusArea([], generals, "expert"), { kind: "general", name: "architecture" });
  });
});

describe("fallbackFocusAreas", () => {
  it("lists the planned area first and every other area once", () => {
    assert.deepEqual(fallbackFocusAreas({ kind: "general", name: "debugging" }, stack, "creative"), [
      { kind: "general", name: "debugging" },
      ts,
      react,
      { kind: "general", name: "best-practices" },
      { kind: "general", name: "architecture" },
      { kind: "general", name: "algorithms" },
      { kind: "general", name: "data-modeling" },
    ]);
  });
});
