import { describe, expect, it } from "vitest";
import { parseSourceDate, toBrDate, toIsoDate } from "./dateUtils";

describe("dateUtils", () => {
  it("formats dates for the SGS query string", () => {
    expect(toBrDate("2024-02-01")).toBe("01/02/2024");
    expect(() => toBrDate("2024/02/01")).toThrow(
      "Expected YYYY-MM-DD, received '2024/02/01'.",
    );
  });

  it("keeps the UTC calendar day", () => {
    expect(toIsoDate(new Date("2025-03-15T23:30:00.000Z"))).toBe("2025-03-15");
  });

  it.each([
    ["01/02/2024", "2024-02-01"],
    [" 31/12/2023 ", "2023-12-31"],
    ["2024-02-29T10:00:00", "2024-02-29"],
    ["2024-03", "2024-03-01"],
  ])("normalizes %j to %s", (input, expected) => {
    expect(parseSourceDate(input)).toBe(expected);
  });

  it.each(["2023-02-29", "31/04/2024", "2024-13", "March 2024", ""])(
    "rejects %j",
    (input) => {
      expect(parseSourceDate(input)).toBeNull();
    },
  );
});
