/**
 * Report composition: stored records → ordered list of report blocks.
 * No I/O happens here; images arrive already loaded as photo outcomes.
 */

import type { Entry, Project } from "../store/types.js";
import type { Statistics } from "../stats/aggregator.js";
import { formatDate } from "../util/dates.js";
import type { PhotoOutcome, ReportBlock, TableRow } from "./blocks.js";
import { formatHours, formatMoney } from "./format.js";
import { fitWithin } from "./layout.js";

export const REPORT_TITLE = "Construction Diary";
export const ENTRY_REPORT_TITLE = "Construction Diary Entry";
export const NO_DESCRIPTION = "No description";
export const NO_ENTRIES = "No entries recorded.";
export const IMAGE_UNAVAILABLE = "Image could not be loaded";

/** A forced page break follows every this many entries (never the last). */
export const ENTRIES_PER_PAGE = 3;
/** A forced page break follows every this many photos (never the last). */
export const PHOTOS_PER_PAGE = 4;

export interface FullReportInput<TImage> {
  project: Project;
  statistics: Statistics;
  /** Ascending by date */
  entries: ReadonlyArray<Entry>;
  /** Ascending by date taken */
  photos: ReadonlyArray<PhotoOutcome<TImage>>;
  currency: string;
}

export interface EntryReportInput {
  projectName: string;
  entry: Entry;
  currency: string;
}

const PAGE_BREAK = { kind: "page-break" } as const;

function hasText(value: string | null): value is string {
  return value !== null && value.trim() !== "";
}

function projectRows(project: Project): TableRow[] {
  return [
    ["Project name", project.name],
    ["Builder", project.builder_name],
    ["Start date", formatDate(project.start_date)],
    ["Status", project.status],
    ["Description", hasText(project.description) ? project.description : NO_DESCRIPTION],
  ];
}

function statisticsRows(stats: Statistics, currency: string): TableRow[] {
  return [
    ["Total entries", String(stats.total_entries)],
    ["Total photos", String(stats.total_photos)],
    ["Project days", String(stats.project_days)],
    ["Total costs", formatMoney(stats.total_costs, currency)],
    ["Total work hours", formatHours(stats.total_hours)],
    ["Completion", `${stats.completion}%`],
  ];
}

/** Rows for the optional fields that are set; empty when none are. */
export function entryDetailRows(entry: Entry, currency: string): TableRow[] {
  const rows: TableRow[] = [];
  if (hasText(entry.weather)) rows.push(["Weather", entry.weather]);
  if (entry.temperature !== null) rows.push(["Temperature", `${entry.temperature}°C`]);
  if (entry.workers_count !== null) rows.push(["Workers", String(entry.workers_count)]);
  if (entry.work_hours !== null) rows.push(["Work hours", `${entry.work_hours} h`]);
  if (entry.costs !== null) rows.push(["Costs", formatMoney(entry.costs, currency)]);
  return rows;
}

function entryBlocks<TImage>(entry: Entry, heading: string, currency: string): ReportBlock<TImage>[] {
  const blocks: ReportBlock<TImage>[] = [{ kind: "heading", level: 2, text: heading }];

  const rows = entryDetailRows(entry, currency);
  if (rows.length > 0) blocks.push({ kind: "table", rows });

  blocks.push({ kind: "paragraph", label: "Work performed", text: entry.content });
  if (hasText(entry.materials)) {
    blocks.push({ kind: "paragraph", label: "Materials", text: entry.materials });
  }
  if (hasText(entry.notes)) {
    blocks.push({ kind: "paragraph", label: "Notes", text: entry.notes });
  }
  return blocks;
}

function photoBlock<TImage>(outcome: PhotoOutcome<TImage>): ReportBlock<TImage> {
  const { photo } = outcome;
  const caption = [photo.original_filename, `Date: ${formatDate(photo.date_taken)}`];
  if (hasText(photo.description)) caption.push(photo.description);

  if (!outcome.ok) {
    return { kind: "photo-missing", message: IMAGE_UNAVAILABLE, caption };
  }
  return {
    kind: "photo",
    image: outcome.image,
    size: fitWithin(outcome.width, outcome.height),
    caption,
  };
}

/** True when a forced break belongs after item `index` (0-based) of `count`. */
export function breaksAfter(index: number, count: number, perPage: number): boolean {
  return (index + 1) % perPage === 0 && index < count - 1;
}

export function composeFullReport<TImage>(input: FullReportInput<TImage>): ReportBlock<TImage>[] {
  const { project, entries, photos, currency } = input;
  const blocks: ReportBlock<TImage>[] = [
    { kind: "title", title: REPORT_TITLE, subtitle: project.name },
    { kind: "heading", level: 1, text: "Project Information" },
    { kind: "table", rows: projectRows(project) },
    { kind: "heading", level: 1, text: "Statistics" },
    { kind: "table", rows: statisticsRows(input.statistics, currency) },
    PAGE_BREAK,
    { kind: "heading", level: 1, text: "Diary Entries" },
  ];

  if (entries.length === 0) {
    blocks.push({ kind: "paragraph", label: null, text: NO_ENTRIES });
  }
  entries.forEach((entry, i) => {
    blocks.push(...entryBlocks<TImage>(entry, `Entry ${i + 1}: ${formatDate(entry.date)}`, currency));
    if (breaksAfter(i, entries.length, ENTRIES_PER_PAGE)) blocks.push(PAGE_BREAK);
  });

  if (photos.length > 0) {
    blocks.push(PAGE_BREAK, { kind: "heading", level: 1, text: "Photo Documentation" });
    photos.forEach((outcome, i) => {
      blocks.push(photoBlock(outcome));
      if (breaksAfter(i, photos.length, PHOTOS_PER_PAGE)) blocks.push(PAGE_BREAK);
    });
  }

  return blocks;
}

/** A single entry on its own: no statistics, numbering or photos. */
export function composeEntryReport<TImage>(input: EntryReportInput): ReportBlock<TImage>[] {
  return [
    { kind: "title", title: ENTRY_REPORT_TITLE, subtitle: input.projectName },
    ...entryBlocks<TImage>(input.entry, `Entry of ${formatDate(input.entry.date)}`, input.currency),
  ];
}
