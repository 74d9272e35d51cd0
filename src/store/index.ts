import type Database from "better-sqlite3";
import { ProjectStore } from "./projects.js";
import { EntryStore } from "./entries.js";
import { PhotoStore } from "./photos.js";

export interface Stores {
  projects: ProjectStore;
  entries: EntryStore;
  photos: PhotoStore;
}

export function createStores(db: Database.Database): Stores {
  return {
    projects: new ProjectStore(db),
    entries: new EntryStore(db),
    photos: new PhotoStore(db),
  };
}

export { openDatabase } from "./database.js";
export type {
  CreateEntryInput,
  CreatePhotoInput,
  CreateProjectInput,
  Entry,
  Photo,
  Project,
  SortOrder,
  UpdateProjectInput,
} from "./types.js";
