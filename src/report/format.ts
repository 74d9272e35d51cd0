import { compactDate } from "../util/dates.js";

export function formatMoney(amount: number, currency: string): string {
  const fixed = amount.toFixed(2);
  return currency ? `${fixed} ${currency}` : fixed;
}

export function formatHours(hours: number): string {
  return `${hours.toFixed(1)} h`;
}

/** Project name reduced to characters every filesystem and header accepts. */
export function filenameSafe(name: string): string {
  const safe = name
    .trim()
    .replace(/\s+/g, "_")
    .replace(/[^A-Za-z0-9_-]/g, "");
  return safe === "" ? "Project" : safe;
}

export function reportFilename(projectName: string, today: string): string {
  return `Site_Diary_${filenameSafe(projectName)}_${compactDate(today)}.pdf`;
}

export function entryReportFilename(entryDate: string, today: string): string {
  return `Site_Diary_Entry_${compactDate(entryDate)}_${compactDate(today)}.pdf`;
}
