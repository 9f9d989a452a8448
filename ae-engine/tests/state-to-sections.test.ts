import { describe, expect, it } from "vitest";
import { STATE_SCHEMA_VERSION } from "@/lib/analysis-schema";
import { stateToSections, toDisplay } from "../lib/analysis/state-to-sections";
import { type AbsState, createState } from "../lib/core/state";
import { createAddress, createInterval } from "../lib/core/value";

function makeState(): AbsState {
  return createState(
    [
      [3, createInterval(0, 4)],
      [1, createAddress([0x7f000002])],
    ],
    [
      [2, createInterval(5, 1)],
      [4, createInterval()],
    ],
  );
}

describe("toDisplay", () => {
  it("styles values by how much they say", () => {
    expect(toDisplay(createInterval(0, 4))).toEqual({
      label: "[0, 4]",
      style: "safe",
      kind: "interval",
    });
    expect(toDisplay(createInterval()).style).toBe("warning");
    expect(toDisplay(createInterval(2, 1))).toMatchObject({
      label: "⊥",
      style: "neutral",
    });
    expect(toDisplay(createAddress()).style).toBe("neutral");
    expect(toDisplay(createAddress([1])).style).toBe("info");
  });
});

describe("stateToSections", () => {
  it("emits variable and object sections with sorted keys", () => {
    const dump = stateToSections(makeState());
    expect(dump.schemaVersion).toBe(STATE_SCHEMA_VERSION);
    expect(dump.sections.map((s) => s.id)).toEqual(["vars", "objs"]);

    const vars = dump.sections[0];
    expect(Object.keys(vars.data)).toEqual(["1", "3"]);
    expect(vars.data["1"].label).toBe("{0x7f000002}");
    expect(vars.data["3"].label).toBe("[0, 4]");
  });

  it("raises an alert when an object holds bottom", () => {
    const objs = stateToSections(makeState()).sections.find(
      (s) => s.id === "objs",
    );
    expect(objs?.alert).toBe(true);
    expect(objs?.data["4"].style).toBe("warning");

    const clean = stateToSections(createState([], [[1, createInterval(0, 0)]]));
    expect(clean.sections[1].alert).toBe(false);
  });

  it("omits the object section when asked", () => {
    const dump = stateToSections(makeState(), { includeObjects: false });
    expect(dump.sections.map((s) => s.id)).toEqual(["vars"]);
  });
});
