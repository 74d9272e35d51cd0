import busboy from "busboy";
import type { IncomingMessage } from "node:http";
import { PayloadTooLargeError, ValidationError } from "../util/errors.js";
import type { UploadedFile } from "./files.js";

export interface MultipartBody {
  fields: Record<string, string>;
  /** The file sent under `fileField`, or null when the form had none. */
  file: UploadedFile | null;
}

export interface MultipartOptions {
  maxFileSize: number;
  /** Form field carrying the file (default: "file") */
  fileField?: string;
}

/**
 * Read a multipart/form-data request. Only one file is kept; other file
 * parts are drained and dropped.
 */
export function readMultipart(
  req: IncomingMessage,
  options: MultipartOptions,
): Promise<MultipartBody> {
  const fileField = options.fileField ?? "file";

  return new Promise((resolve, reject) => {
    let parser: busboy.Busboy;
    try {
      parser = busboy({
        headers: req.headers,
        limits: { fileSize: options.maxFileSize, files: 1, fields: 20 },
      });
    } catch (e) {
      reject(new ValidationError(`Expected multipart/form-data: ${e instanceof Error ? e.message : e}`));
      return;
    }

    const fields: Record<string, string> = {};
    let file: UploadedFile | null = null;
    let tooLarge = false;
    let pendingFile: Promise<void> = Promise.resolve();

    parser.on("field", (name, value) => {
      fields[name] = value;
    });

    parser.on("file", (name, stream, info) => {
      if (name !== fileField) {
        stream.resume();
        return;
      }

      const chunks: Buffer[] = [];
      stream.on("data", (chunk: Buffer) => chunks.push(chunk));
      stream.on("limit", () => {
        tooLarge = true;
      });
      pendingFile = new Promise<void>((done, fail) => {
        stream.on("end", () => {
          file = { filename: info.filename ?? "", data: Buffer.concat(chunks) };
          done();
        });
        stream.on("error", fail);
      });
    });

    parser.on("error", (e) => reject(e));

    req.on("error", (e) => {
      req.unpipe(parser);
      reject(e);
    });
    req.on("aborted", () => {
      req.unpipe(parser);
      reject(new ValidationError("Upload aborted by the client"));
    });

    parser.on("close", () => {
      pendingFile
        .then(() => {
          if (tooLarge) {
            reject(new PayloadTooLargeError(options.maxFileSize));
            return;
          }
          resolve({ fields, file });
        })
        .catch(reject);
    });

    req.pipe(parser);
  });
}
