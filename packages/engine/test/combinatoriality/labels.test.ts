import { describe, it, expect } from "vitest";
import { SEGMENT_SIZES } from "@rowforms/contracts";
import { ToneRow } from "../../src/rows/ToneRow";
import { InvalidLabelError } from "../../src/errors";
import { partition } from "../../src/partition/partition";
import { formatLabel, parseLabel, applyTransformation } from "../../src/combinatoriality/labels";
import { candidateForms, referenceForm } from "../../src/combinatoriality/forms";
import { detect, DETECTION_RULES } from "../../src/combinatoriality/detector";
import { intervalBetween } from "../../src/pitch/pitchClass";

const CHROMATIC = ToneRow.from([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
const ROW_A = ToneRow.from([0, 11, 7, 8, 3, 1, 2, 10, 6, 5, 4, 9]);
const AUGMENTED = ToneRow.from([0, 4, 8, 1, 5, 9, 2, 6, 10, 3, 7, 11]);

describe("formatLabel", () => {
  it("renders kind and level without separators", () => {
    expect(formatLabel({ kind: "P", level: 6 })).toBe("P6");
    expect(formatLabel({ kind: "RI", level: 0 })).toBe("RI0");
    expect(formatLabel({ kind: "I", level: 11 })).toBe("I11");
  });
});

describe("parseLabel", () => {
  it("parses every kind", () => {
    expect(parseLabel("P6")).toEqual({ kind: "P", level: 6 });
    expect(parseLabel("R11")).toEqual({ kind: "R", level: 11 });
    expect(parseLabel("I0")).toEqual({ kind: "I", level: 0 });
    expect(parseLabel("RI5")).toEqual({ kind: "RI", level: 5 });
  });

  it.each(["", "P", "X3", "P12", "P05", "RI-1", "p6", "P 6", "IR3"])(
    "rejects %j",
    (text) => {
      expect(() => parseLabel(text)).toThrow(InvalidLabelError);
    }
  );
});

describe("candidate and reference forms", () => {
  it("takes P from rows and RI from reversed columns", () => {
    expect(candidateForms(ROW_A, "P")[1]).toEqual(ROW_A.row(1));
    expect(candidateForms(ROW_A, "RI")[2]).toEqual(ROW_A.column(2).reverse());
  });

  it("uses the level-0 form of each kind as reference", () => {
    expect(referenceForm(CHROMATIC, "R")).toEqual([11, 10, 9, 8, 7, 6, 5, 4, 3, 2, 1, 0]);
    expect(referenceForm(CHROMATIC, "RI")).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 0]);
  });
});

describe("applyTransformation", () => {
  it("builds named forms of the chromatic row", () => {
    expect(applyTransformation(CHROMATIC, parseLabel("P6"))).toEqual([
      6, 7, 8, 9, 10, 11, 0, 1, 2, 3, 4, 5,
    ]);
    expect(applyTransformation(CHROMATIC, parseLabel("I11"))).toEqual([
      11, 10, 9, 8, 7, 6, 5, 4, 3, 2, 1, 0,
    ]);
    expect(applyTransformation(CHROMATIC, parseLabel("RI5"))).toEqual([
      6, 7, 8, 9, 10, 11, 0, 1, 2, 3, 4, 5,
    ]);
  });

  it("returns the reference form at level 0", () => {
    expect(applyTransformation(ROW_A, { kind: "R", level: 0 })).toEqual(ROW_A.retrograde());
  });
});

describe("label round-trip", () => {
  for (const [name, row] of [
    ["chromatic", CHROMATIC],
    ["row A", ROW_A],
    ["augmented", AUGMENTED],
  ] as const) {
    for (const size of SEGMENT_SIZES) {
      it(`reproduces every ${size}-segment form of ${name}`, () => {
        const reference = partition(row.prime(), size);

        for (const detected of detect(row, size)) {
          const label = parseLabel(formatLabel(detected));
          expect(label).toEqual(detected);

          const form = applyTransformation(row, label);
          expect(candidateForms(row, label.kind)).toContainEqual(form);
          expect(intervalBetween(referenceForm(row, label.kind)[0], form[0])).toBe(label.level);
          expect(DETECTION_RULES[size].test(partition(form, size), reference)).toBe(true);
        }
      });
    }
  }
});
