/**
 * Plain-JSON dump of a project with its entries and photo metadata, for
 * backups and hand-off to other tools.
 */

import type { Stores } from "../store/index.js";
import { NotFoundError } from "../util/errors.js";

export interface ProjectExport {
  project: {
    name: string;
    builder_name: string;
    start_date: string;
    status: string;
    description: string | null;
  };
  entries: Array<{
    date: string;
    weather: string | null;
    temperature: number | null;
    content: string;
    workers_count: number | null;
    materials: string | null;
    work_hours: number | null;
    costs: number | null;
    notes: string | null;
  }>;
  photos: Array<{
    filename: string;
    description: string | null;
    date_taken: string;
  }>;
}

export function exportProject(stores: Stores, projectId: number): ProjectExport {
  const project = stores.projects.get(projectId);
  if (!project) throw new NotFoundError("project", projectId);

  return {
    project: {
      name: project.name,
      builder_name: project.builder_name,
      start_date: project.start_date,
      status: project.status,
      description: project.description,
    },
    entries: stores.entries.listByProject(projectId, "asc").map((e) => ({
      date: e.date,
      weather: e.weather,
      temperature: e.temperature,
      content: e.content,
      workers_count: e.workers_count,
      materials: e.materials,
      work_hours: e.work_hours,
      costs: e.costs,
      notes: e.notes,
    })),
    photos: stores.photos.listByProject(projectId, "asc").map((p) => ({
      filename: p.original_filename,
      description: p.description,
      date_taken: p.date_taken,
    })),
  };
}
