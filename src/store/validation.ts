/**
 * Request-body validation for the record store. Bodies arrive as parsed JSON
 * (or form fields), so every field is `unknown` until checked here.
 */

import { ValidationError } from "../util/errors.js";
import { isIsoDate } from "../util/dates.js";
import type { CreateEntryInput, UpdateProjectInput } from "./types.js";

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || value === "";
}

function requiredText(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`Missing required '${field}' field`, field);
  }
  return value.trim();
}

/** Trimmed text, or null when missing or blank. */
function optionalText(body: Record<string, unknown>, field: string): string | null {
  const value = body[field];
  if (isAbsent(value)) return null;
  if (typeof value !== "string") {
    throw new ValidationError(`'${field}' must be a string`, field);
  }
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

/** Number or numeric string; "" and null count as absent, 0 does not. */
function optionalNumber(body: Record<string, unknown>, field: string): number | null {
  const value = body[field];
  if (isAbsent(value)) return null;

  let n: number;
  if (typeof value === "number") {
    n = value;
  } else if (typeof value === "string" && value.trim() !== "") {
    n = Number(value.trim());
  } else {
    throw new ValidationError(`'${field}' must be a number`, field);
  }

  if (!Number.isFinite(n)) {
    throw new ValidationError(`'${field}' must be a number`, field);
  }
  return n;
}

function nonNegative(n: number | null, field: string): number | null {
  if (n !== null && n < 0) {
    throw new ValidationError(`'${field}' must not be negative`, field);
  }
  return n;
}

function isoDate(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== "string" || !isIsoDate(value.trim())) {
    throw new ValidationError(`'${field}' must be a date in format YYYY-MM-DD`, field);
  }
  return value.trim();
}

export function parseEntryInput(body: Record<string, unknown>): CreateEntryInput {
  if (isAbsent(body.date)) {
    throw new ValidationError("Missing required 'date' field", "date");
  }
  const date = isoDate(body, "date");
  const content = requiredText(body, "content");

  const workers = nonNegative(optionalNumber(body, "workers_count"), "workers_count");
  if (workers !== null && !Number.isInteger(workers)) {
    throw new ValidationError("'workers_count' must be a whole number", "workers_count");
  }

  return {
    date,
    weather: optionalText(body, "weather"),
    temperature: optionalNumber(body, "temperature"),
    content,
    workers_count: workers,
    materials: optionalText(body, "materials"),
    work_hours: nonNegative(optionalNumber(body, "work_hours"), "work_hours"),
    costs: nonNegative(optionalNumber(body, "costs"), "costs"),
    notes: optionalText(body, "notes"),
  };
}

/** Partial project update: only keys present in the body are changed. */
export function parseProjectUpdate(body: Record<string, unknown>): UpdateProjectInput {
  const update: UpdateProjectInput = {};

  if (body.name !== undefined) update.name = requiredText(body, "name");
  if (body.builder_name !== undefined) update.builder_name = requiredText(body, "builder_name");
  if (body.status !== undefined) update.status = requiredText(body, "status");
  if (body.start_date !== undefined) update.start_date = isoDate(body, "start_date");
  if (body.description !== undefined) update.description = optionalText(body, "description");

  return update;
}

/** Photo form fields: optional description and date_taken (defaults to `today`). */
export function parsePhotoFields(
  fields: Record<string, unknown>,
  today: string,
): { description: string | null; date_taken: string } {
  return {
    description: optionalText(fields, "description"),
    date_taken: isAbsent(fields.date_taken) ? today : isoDate(fields, "date_taken"),
  };
}
