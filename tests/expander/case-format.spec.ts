import { describe, expect, it } from "vitest";

import { matchCase } from "../../src/expander/case-format.js";

describe("matchCase", () => {
  it.each([
    ["btw", "by the way", "by the way"],
    ["Btw", "by the way", "By the way"],
    ["BTW", "by the way", "BY THE WAY"],
    ["BTw", "by the way", "By the way"],
    ["bTW", "by the way", "by the way"],
    ["8Ball", "eight ball", "Eight ball"],
    ["8BALL", "eight ball", "EIGHT BALL"],
    ["80B", "test", "Test"],
    ["T", "test", "Test"],
    ["NAME", "Jefferson", "JEFFERSON"],
    ["Name", "jefferson", "Jefferson"],
    ["Eightyfour", "8-four", "8-four"],
    ["EIGHTYFOUR", "8-four", "8-FOUR"],
  ])("%s turns %j into %j", (typed, output, expected) => {
    expect(matchCase(typed, output)).toBe(expected);
  });

  it("leaves the output alone when nothing typed has case", () => {
    expect(matchCase("42!", "forty-two")).toBe("forty-two");
  });

  it("handles empty output", () => {
    expect(matchCase("AB", "")).toBe("");
    expect(matchCase("Ab", "")).toBe("");
  });

  it("capitalises non-ASCII letters", () => {
    expect(matchCase("Ue", "über")).toBe("Über");
    expect(matchCase("ÉTÉ", "été")).toBe("ÉTÉ");
  });
});
