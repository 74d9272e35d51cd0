import { readFile } from "node:fs/promises";
import type { PDFDocument, PDFImage } from "pdf-lib";
import type { Photo } from "../store/types.js";
import { errorMessage } from "../util/errors.js";
import { getLogger } from "../util/logger.js";
import type { PhotoOutcome } from "./blocks.js";

const log = getLogger("report-images");

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8];

function startsWith(bytes: Uint8Array, signature: number[]): boolean {
  return signature.every((b, i) => bytes[i] === b);
}

/** Embed PNG or JPEG bytes; anything else is rejected. */
export async function embedImage(pdf: PDFDocument, bytes: Uint8Array): Promise<PDFImage> {
  if (startsWith(bytes, PNG_SIGNATURE)) return pdf.embedPng(bytes);
  if (startsWith(bytes, JPEG_SIGNATURE)) return pdf.embedJpg(bytes);
  throw new Error("Unsupported image format (PNG and JPEG can be embedded)");
}

/**
 * Load every photo's image into `pdf`, one at a time. A missing, unreadable
 * or unsupported file yields a failed outcome for that photo only.
 */
export async function loadPhotoImages(
  pdf: PDFDocument,
  photos: ReadonlyArray<Photo>,
  resolvePath: (filename: string) => string,
): Promise<PhotoOutcome<PDFImage>[]> {
  const outcomes: PhotoOutcome<PDFImage>[] = [];

  for (const photo of photos) {
    const path = resolvePath(photo.filename);
    try {
      // Copy into a fresh buffer: pdf-lib reads through the backing ArrayBuffer
      const bytes = new Uint8Array(await readFile(path));
      const image = await embedImage(pdf, bytes);
      if (!(image.width > 0 && image.height > 0)) {
        throw new Error(`Image has no area (${image.width}x${image.height})`);
      }
      outcomes.push({ ok: true, photo, image, width: image.width, height: image.height });
    } catch (e) {
      log.warn({ photoId: photo.id, path, err: e }, "photo image could not be loaded");
      outcomes.push({ ok: false, photo, reason: errorMessage(e) });
    }
  }

  return outcomes;
}
