import { describe, it, expect } from "vitest";
import { compactDate, daysBetween, formatDate, isIsoDate, toIsoDate } from "./dates.js";

describe("isIsoDate", () => {
  it("accepts real calendar dates", () => {
    expect(isIsoDate("2024-01-09")).toBe(true);
    expect(isIsoDate("2024-02-29")).toBe(true);
  });

  it("rejects impossible dates", () => {
    expect(isIsoDate("2024-02-30")).toBe(false);
    expect(isIsoDate("2023-02-29")).toBe(false);
    expect(isIsoDate("2024-13-01")).toBe(false);
  });

  it("rejects other formats", () => {
    expect(isIsoDate("09.01.2024")).toBe(false);
    expect(isIsoDate("2024-1-9")).toBe(false);
    expect(isIsoDate("")).toBe(false);
  });
});

describe("toIsoDate", () => {
  it("uses the local calendar date", () => {
    expect(toIsoDate(new Date(2024, 0, 9, 23, 30))).toBe("2024-01-09");
  });
});

describe("formatDate", () => {
  it("renders dd.mm.yyyy", () => {
    expect(formatDate("2024-01-09")).toBe("09.01.2024");
  });

  it("throws on invalid input", () => {
    expect(() => formatDate("yesterday")).toThrow("Invalid date: yesterday. Use format YYYY-MM-DD");
  });
});

describe("compactDate", () => {
  it("drops the separators", () => {
    expect(compactDate("2024-12-31")).toBe("20241231");
  });
});

describe("daysBetween", () => {
  it("counts whole days", () => {
    expect(daysBetween("2024-01-01", "2024-01-10")).toBe(9);
  });

  it("is zero for the same day", () => {
    expect(daysBetween("2024-05-05", "2024-05-05")).toBe(0);
  });

  it("is negative when the end is earlier", () => {
    expect(daysBetween("2024-03-01", "2024-02-28")).toBe(-2);
  });

  it("spans leap days", () => {
    expect(daysBetween("2024-02-28", "2024-03-01")).toBe(2);
  });
});
