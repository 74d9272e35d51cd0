/**
 * Summary figures for a project. Pure: the caller supplies stored state and
 * the reference date.
 */

import type { Entry } from "../store/types.js";
import { daysBetween } from "../util/dates.js";

/** Fixed value reported as the completion percentage; nothing derives it. */
export const COMPLETION_PLACEHOLDER = 65;

export interface Statistics {
  total_entries: number;
  total_photos: number;
  /** Days since the start date, counting both the start day and today */
  project_days: number;
  total_costs: number;
  total_hours: number;
  completion: number;
}

export interface StatisticsInput {
  startDate: string;
  entries: ReadonlyArray<Pick<Entry, "costs" | "work_hours">>;
  photoCount: number;
  /** Reference date, YYYY-MM-DD */
  today: string;
}

export function computeStatistics(input: StatisticsInput): Statistics {
  let costs = 0;
  let hours = 0;
  for (const entry of input.entries) {
    costs += entry.costs ?? 0;
    hours += entry.work_hours ?? 0;
  }

  return {
    total_entries: input.entries.length,
    total_photos: input.photoCount,
    project_days: daysBetween(input.startDate, input.today) + 1,
    total_costs: costs,
    total_hours: hours,
    completion: COMPLETION_PLACEHOLDER,
  };
}
