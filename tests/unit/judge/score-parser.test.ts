import { describe, expect, it } from "vitest";

import { parseScore } from "../../../src/judge/score-parser.js";

describe("parseScore", () => {
  it("parses a bare number", () => {
    expect(parseScore("4")).toBe(4);
    expect(parseScore(" 3.5 \n")).toBe(3.5);
    expect(parseScore(".5")).toBe(0.5);
    expect(parseScore("-1")).toBe(-1);
  });

  it("strips trailing punctuation", () => {
    expect(parseScore("4.")).toBe(4);
    expect(parseScore("5!")).toBe(5);
  });

  it("takes the leading number of a longer reply", () => {
    expect(parseScore("3 out of 5")).toBe(3);
    expect(parseScore("2, because the answer is incomplete")).toBe(2);
  });

  it("returns null when there is no leading number", () => {
    expect(parseScore("")).toBeNull();
    expect(parseScore("Great answer")).toBeNull();
    expect(parseScore("Score: 4")).toBeNull();
    expect(parseScore("4/5")).toBeNull();
  });
});
