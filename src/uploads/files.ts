/**
 * Photo files on disk. A photo is a database row plus an image file in the
 * upload directory; this module creates and removes the two together.
 *
 *   save:   write file → insert row (file removed again if the insert fails)
 *   delete: remove row → unlink file (a file that is already gone is fine)
 */

import { randomUUID } from "node:crypto";
import { mkdir, unlink, writeFile } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import type { PhotoStore } from "../store/photos.js";
import type { ProjectDeletion, ProjectStore } from "../store/projects.js";
import type { Photo } from "../store/types.js";
import { ValidationError, errorMessage } from "../util/errors.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("uploads");

/** Formats the PDF report can embed. */
export const ALLOWED_EXTENSIONS: ReadonlySet<string> = new Set(["png", "jpg", "jpeg"]);

export interface UploadedFile {
  /** Name as sent by the client */
  filename: string;
  data: Buffer;
}

export interface PhotoMeta {
  description: string | null;
  date_taken: string;
}

/** Record and file diverged: the row is gone but the file could not be removed. */
export class PhotoFileError extends Error {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Photo record removed but file ${path} could not be deleted: ${errorMessage(cause)}`, {
      cause,
    });
    this.name = "PhotoFileError";
  }
}

/** Lower-case extension without the dot, or null when the name has none. */
export function fileExtension(filename: string): string | null {
  const dot = filename.lastIndexOf(".");
  if (dot < 0 || dot === filename.length - 1) return null;
  return filename.slice(dot + 1).toLowerCase();
}

export function isAllowedFile(filename: string): boolean {
  const ext = fileExtension(filename);
  return ext !== null && ALLOWED_EXTENSIONS.has(ext);
}

/**
 * Make a client-supplied filename safe to store and display: ASCII only, no
 * directory parts, whitespace collapsed to "_".
 */
export function sanitizeFilename(filename: string): string {
  const ascii = filename
    .normalize("NFKD")
    .replace(/[^\x20-\x7e]/g, "")
    .replace(/[/\\]/g, " ");
  const cleaned = ascii
    .trim()
    .split(/\s+/)
    .join("_")
    .replace(/[^A-Za-z0-9_.-]/g, "")
    .replace(/^[._]+|[._]+$/g, "");
  return cleaned === "" ? "upload" : cleaned;
}

/** Random 32-hex-char token plus the original extension. */
export function generateStoredName(originalName: string): string {
  const ext = fileExtension(originalName);
  if (!ext) throw new ValidationError("Invalid file type", "file");
  return `${randomUUID().replace(/-/g, "")}.${ext}`;
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

export class PhotoLibrary {
  private readonly uploadDir: string;

  constructor(
    private photos: PhotoStore,
    private projects: ProjectStore,
    uploadDir: string,
  ) {
    this.uploadDir = resolve(uploadDir);
  }

  async ensureDir(): Promise<void> {
    await mkdir(this.uploadDir, { recursive: true });
  }

  getUploadDir(): string {
    return this.uploadDir;
  }

  /** Absolute path of a stored file. Directory parts in `filename` are ignored. */
  resolvePath(filename: string): string {
    return join(this.uploadDir, basename(filename));
  }

  async save(projectId: number, file: UploadedFile, meta: PhotoMeta): Promise<Photo> {
    if (file.filename.trim() === "") {
      throw new ValidationError("No file selected", "file");
    }
    if (!isAllowedFile(file.filename)) {
      throw new ValidationError("Invalid file type", "file");
    }

    const storedName = generateStoredName(file.filename);
    const path = this.resolvePath(storedName);

    await this.ensureDir();
    // "wx": never overwrite, even on a token collision
    await writeFile(path, file.data, { flag: "wx" });

    try {
      return this.photos.create(projectId, {
        filename: storedName,
        original_filename: sanitizeFilename(file.filename),
        description: meta.description,
        date_taken: meta.date_taken,
        file_size: file.data.length,
      });
    } catch (e) {
      log.error({ err: e, path }, "photo insert failed, removing file");
      await this.unlinkQuietly(path);
      throw e;
    }
  }

  /** Delete a photo row and its file. Returns false when the photo does not exist. */
  async delete(id: number): Promise<boolean> {
    const photo = this.photos.get(id);
    if (!photo) return false;

    this.photos.delete(id);
    await this.removeFile(photo.filename);
    return true;
  }

  /**
   * Delete a project with its entries and photos, then the photo files.
   * Every file is attempted; the first failure is raised afterwards.
   */
  async deleteProject(projectId: number): Promise<ProjectDeletion | undefined> {
    const deletion = this.projects.delete(projectId);
    if (!deletion) return undefined;

    let firstError: PhotoFileError | null = null;
    for (const photo of deletion.photosRemoved) {
      try {
        await this.removeFile(photo.filename);
      } catch (e) {
        if (!(e instanceof PhotoFileError)) throw e;
        firstError ??= e;
      }
    }
    if (firstError) throw firstError;
    return deletion;
  }

  private async removeFile(filename: string): Promise<void> {
    const path = this.resolvePath(filename);
    try {
      await unlink(path);
    } catch (e) {
      if (isNotFound(e)) {
        log.warn({ path }, "photo file already missing");
        return;
      }
      log.error({ err: e, path }, "photo file could not be deleted");
      throw new PhotoFileError(path, e);
    }
  }

  private async unlinkQuietly(path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (e) {
      log.warn({ err: e, path }, "failed to remove orphaned upload");
    }
  }
}
