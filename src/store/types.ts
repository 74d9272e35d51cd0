/** Project row -- the construction project a diary belongs to. */
export interface Project {
  id: number;
  name: string;
  builder_name: string;
  start_date: string; // YYYY-MM-DD
  status: string; // free text, e.g. "In progress"
  description: string | null;
  created_at: string;
}

/** Entry row -- one day of work on site. Never updated after insert. */
export interface Entry {
  id: number;
  project_id: number;
  date: string; // YYYY-MM-DD
  weather: string | null;
  temperature: number | null; // °C
  content: string;
  workers_count: number | null;
  materials: string | null;
  work_hours: number | null;
  costs: number | null;
  notes: string | null;
  created_at: string;
}

/** Photo row. `filename` names the file in the upload directory. */
export interface Photo {
  id: number;
  project_id: number;
  filename: string;
  original_filename: string;
  description: string | null;
  date_taken: string; // YYYY-MM-DD
  file_size: number;
  created_at: string;
}

export interface CreateProjectInput {
  name: string;
  builder_name: string;
  start_date: string;
  status: string;
  description?: string | null;
}

export interface UpdateProjectInput {
  name?: string;
  builder_name?: string;
  start_date?: string;
  status?: string;
  description?: string | null;
}

export interface CreateEntryInput {
  date: string;
  weather?: string | null;
  temperature?: number | null;
  content: string;
  workers_count?: number | null;
  materials?: string | null;
  work_hours?: number | null;
  costs?: number | null;
  notes?: string | null;
}

export interface CreatePhotoInput {
  filename: string;
  original_filename: string;
  description?: string | null;
  date_taken: string;
  file_size: number;
}

export type SortOrder = "asc" | "desc";
