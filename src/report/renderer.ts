/**
 * ReportRenderer -- turns the stored diary into downloadable PDF documents.
 *
 *   load photos → compose blocks → lay out with pdf-lib → bytes
 *
 * A photo whose image cannot be loaded becomes a placeholder in the document.
 * A missing project or entry raises NotFoundError; anything else that goes
 * wrong while assembling the document raises ReportError and nothing is
 * returned.
 */

import { PDFDocument, type PDFImage } from "pdf-lib";
import type { Stores } from "../store/index.js";
import { computeStatistics } from "../stats/aggregator.js";
import { toIsoDate } from "../util/dates.js";
import { NotFoundError, errorMessage } from "../util/errors.js";
import { getLogger } from "../util/logger.js";
import { outlineOf, type ReportBlock } from "./blocks.js";
import { ENTRY_REPORT_TITLE, REPORT_TITLE, composeEntryReport, composeFullReport } from "./compose.js";
import { entryReportFilename, reportFilename } from "./format.js";
import { loadPhotoImages } from "./images.js";
import { PdfWriter } from "./pdf-writer.js";

const log = getLogger("report");

export interface ReportDocument {
  data: Uint8Array;
  /** Suggested download name */
  filename: string;
  /** Structural text of the document, one line per block */
  outline: string[];
}

export interface ReportRendererOptions {
  currency: string;
  /** Clock used for "today"; defaults to the system clock */
  now?: () => Date;
}

export class ReportError extends Error {
  constructor(message: string, cause: unknown) {
    super(`Report generation failed: ${message}`, { cause });
    this.name = "ReportError";
  }
}

export class ReportRenderer {
  private readonly now: () => Date;

  constructor(
    private stores: Stores,
    private resolvePhotoPath: (filename: string) => string,
    private options: ReportRendererOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async renderFullReport(projectId: number): Promise<ReportDocument> {
    const project = this.stores.projects.get(projectId);
    if (!project) throw new NotFoundError("project", projectId);

    const entries = this.stores.entries.listByProject(projectId, "asc");
    const photos = this.stores.photos.listByProject(projectId, "asc");
    const today = toIsoDate(this.now());
    const statistics = computeStatistics({
      startDate: project.start_date,
      entries,
      photoCount: photos.length,
      today,
    });

    return this.assemble(`${REPORT_TITLE} - ${project.name}`, async (pdf) => {
      const outcomes = await loadPhotoImages(pdf, photos, this.resolvePhotoPath);
      const failed = outcomes.filter((o) => !o.ok).length;
      log.info(
        { projectId, entries: entries.length, photos: photos.length, failedPhotos: failed },
        "rendering full report",
      );
      return {
        blocks: composeFullReport({
          project,
          statistics,
          entries,
          photos: outcomes,
          currency: this.options.currency,
        }),
        filename: reportFilename(project.name, today),
      };
    });
  }

  async renderEntryReport(entryId: number): Promise<ReportDocument> {
    const entry = this.stores.entries.get(entryId);
    if (!entry) throw new NotFoundError("entry", entryId);
    const project = this.stores.projects.get(entry.project_id);
    if (!project) throw new NotFoundError("project", entry.project_id);

    const today = toIsoDate(this.now());
    log.info({ entryId, projectId: project.id }, "rendering entry report");

    return this.assemble(`${ENTRY_REPORT_TITLE} - ${entry.date}`, async () => ({
      blocks: composeEntryReport<PDFImage>({
        projectName: project.name,
        entry,
        currency: this.options.currency,
      }),
      filename: entryReportFilename(entry.date, today),
    }));
  }

  private async assemble(
    title: string,
    build: (pdf: PDFDocument) => Promise<{ blocks: ReportBlock<PDFImage>[]; filename: string }>,
  ): Promise<ReportDocument> {
    try {
      const pdf = await PDFDocument.create();
      pdf.setTitle(title);
      pdf.setCreator("sitelog");
      pdf.setProducer("sitelog");
      pdf.setCreationDate(this.now());

      const { blocks, filename } = await build(pdf);

      const writer = await PdfWriter.create(pdf);
      writer.write(blocks);
      writer.addPageNumbers();
      const data = await pdf.save();

      log.info({ filename, pages: pdf.getPageCount(), bytes: data.length }, "report rendered");
      return { data, filename, outline: outlineOf(blocks) };
    } catch (e) {
      log.error({ err: e, title }, "report generation failed");
      throw new ReportError(errorMessage(e), e);
    }
  }
}
