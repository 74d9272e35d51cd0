/**
 * Lays report blocks out on A4 pages with pdf-lib.
 *
 * Blocks flow top to bottom; a block that does not fit on the current page
 * moves to a new one, and tall tables or paragraphs continue across pages.
 * Page-break blocks start a new page unless the current one is still empty.
 */

import {
  PageSizes,
  StandardFonts,
  rgb,
  type Color,
  type PDFDocument,
  type PDFFont,
  type PDFImage,
  type PDFPage,
} from "pdf-lib";
import type { ReportBlock, Size, TableRow } from "./blocks.js";
import { PHOTO_BOX, cm } from "./layout.js";

const [PAGE_WIDTH, PAGE_HEIGHT] = PageSizes.A4;
const MARGIN = cm(2);
const CONTENT_WIDTH = PAGE_WIDTH - 2 * MARGIN;

const SIZE = {
  title: 20,
  subtitle: 13,
  h1: 15,
  h2: 12,
  body: 10,
  caption: 9,
  footer: 8,
} as const;

const LINE_GAP = 3;
const CELL_PADDING = 4;
const LABEL_COLUMN = cm(5);
const PHOTO_GUTTER = cm(0.5);
const PLACEHOLDER_HEIGHT = cm(2);

const TEXT = rgb(0.1, 0.1, 0.1);
const MUTED = rgb(0.4, 0.4, 0.4);
const ACCENT = rgb(0.16, 0.33, 0.55);
const BORDER = rgb(0.75, 0.75, 0.75);
const LABEL_FILL = rgb(0.93, 0.94, 0.96);

interface CaptionLine {
  text: string;
  font: PDFFont;
  color: Color;
}

function lineHeight(size: number): number {
  return size + LINE_GAP;
}

export class PdfWriter {
  private page: PDFPage | null = null;
  private y = 0;
  private pageHasContent = false;
  private readonly charset: Set<number>;

  private constructor(
    private pdf: PDFDocument,
    private regular: PDFFont,
    private bold: PDFFont,
  ) {
    this.charset = new Set(regular.getCharacterSet());
  }

  static async create(pdf: PDFDocument): Promise<PdfWriter> {
    const regular = await pdf.embedFont(StandardFonts.Helvetica);
    const bold = await pdf.embedFont(StandardFonts.HelveticaBold);
    return new PdfWriter(pdf, regular, bold);
  }

  write(blocks: ReadonlyArray<ReportBlock<PDFImage>>): void {
    for (const block of blocks) {
      switch (block.kind) {
        case "title":
          this.drawTitle(block.title, block.subtitle);
          break;
        case "heading":
          this.drawHeading(block.text, block.level);
          break;
        case "table":
          this.drawTable(block.rows);
          break;
        case "paragraph":
          this.drawParagraph(block.label, block.text);
          break;
        case "photo":
          this.drawPhoto(block.image, block.size, block.caption);
          break;
        case "photo-missing":
          this.drawPhotoPlaceholder(block.message, block.caption);
          break;
        case "page-break":
          if (this.pageHasContent) this.newPage();
          break;
      }
    }
    if (!this.page) this.newPage();
  }

  /** Stamp "Page i of n" on every page. Call once, after `write`. */
  addPageNumbers(): void {
    const pages = this.pdf.getPages();
    pages.forEach((page, i) => {
      const text = `Page ${i + 1} of ${pages.length}`;
      const width = this.regular.widthOfTextAtSize(text, SIZE.footer);
      page.drawText(text, {
        x: (PAGE_WIDTH - width) / 2,
        y: MARGIN / 2,
        size: SIZE.footer,
        font: this.regular,
        color: MUTED,
      });
    });
  }

  // ── Page management ────────────────────────────────────────────────

  private newPage(): PDFPage {
    const page = this.pdf.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    this.page = page;
    this.y = PAGE_HEIGHT - MARGIN;
    this.pageHasContent = false;
    return page;
  }

  /** Current page, moved to a fresh one when `height` no longer fits. */
  private reserve(height: number): PDFPage {
    if (!this.page) return this.newPage();
    if (this.pageHasContent && this.y - height < MARGIN) return this.newPage();
    return this.page;
  }

  private remaining(): number {
    return this.y - MARGIN;
  }

  // ── Text helpers ───────────────────────────────────────────────────

  /** Replace characters the standard fonts cannot encode. */
  private clean(text: string): string {
    let out = "";
    for (const ch of text.replace(/\r\n?/g, "\n").replace(/\t/g, "    ")) {
      const code = ch.codePointAt(0) ?? 0;
      out += ch === "\n" || this.charset.has(code) ? ch : "?";
    }
    return out;
  }

  private wrap(font: PDFFont, size: number, text: string, maxWidth: number): string[] {
    const width = (s: string) => font.widthOfTextAtSize(s, size);
    const out: string[] = [];

    const breakLongWord = (word: string): string[] => {
      const parts: string[] = [];
      let cur = "";
      for (const ch of word) {
        const next = cur + ch;
        if (width(next) <= maxWidth || cur.length === 0) {
          cur = next;
        } else {
          parts.push(cur);
          cur = ch;
        }
      }
      if (cur) parts.push(cur);
      return parts;
    };

    for (const para of this.clean(text).split("\n")) {
      const words = para.split(/\s+/).filter(Boolean);
      if (words.length === 0) {
        out.push("");
        continue;
      }
      let line = "";
      for (const w of words) {
        const candidate = line ? `${line} ${w}` : w;
        if (width(candidate) <= maxWidth) {
          line = candidate;
          continue;
        }
        if (line) out.push(line);
        if (width(w) > maxWidth) {
          const parts = breakLongWord(w);
          out.push(...parts.slice(0, -1));
          line = parts[parts.length - 1] ?? "";
        } else {
          line = w;
        }
      }
      if (line) out.push(line);
    }
    return out.length > 0 ? out : [""];
  }

  private drawLines(
    page: PDFPage,
    lines: string[],
    x: number,
    top: number,
    font: PDFFont,
    size: number,
    color = TEXT,
  ): void {
    lines.forEach((line, i) => {
      page.drawText(line, { x, y: top - size - i * lineHeight(size), size, font, color });
    });
  }

  // ── Blocks ─────────────────────────────────────────────────────────

  private drawTitle(title: string, subtitle: string): void {
    const titleLines = this.wrap(this.bold, SIZE.title, title, CONTENT_WIDTH);
    const subtitleLines = this.wrap(this.regular, SIZE.subtitle, subtitle, CONTENT_WIDTH);
    const height =
      titleLines.length * lineHeight(SIZE.title) + subtitleLines.length * lineHeight(SIZE.subtitle) + 8;

    this.reserve(height);

    const centered = (lines: string[], font: PDFFont, size: number, color = TEXT) => {
      for (const line of lines) {
        const page = this.reserve(lineHeight(size));
        const w = font.widthOfTextAtSize(line, size);
        page.drawText(line, { x: MARGIN + (CONTENT_WIDTH - w) / 2, y: this.y - size, size, font, color });
        this.y -= lineHeight(size);
        this.pageHasContent = true;
      }
    };
    centered(titleLines, this.bold, SIZE.title, ACCENT);
    this.y -= 8;
    centered(subtitleLines, this.regular, SIZE.subtitle, MUTED);
    this.y -= 18;
    this.pageHasContent = true;
  }

  private drawHeading(text: string, level: 1 | 2): void {
    const size = level === 1 ? SIZE.h1 : SIZE.h2;
    const spaceBefore = level === 1 ? 14 : 10;
    const lines = this.wrap(this.bold, size, text, CONTENT_WIDTH);
    const height = spaceBefore + lines.length * lineHeight(size) + 6;

    // Keep a heading together with at least a few lines of what follows
    const page = this.reserve(height + 3 * lineHeight(SIZE.body));
    if (this.pageHasContent) this.y -= spaceBefore;

    this.drawLines(page, lines, MARGIN, this.y, this.bold, size, level === 1 ? ACCENT : TEXT);
    this.y -= lines.length * lineHeight(size) + 2;

    if (level === 1) {
      page.drawLine({
        start: { x: MARGIN, y: this.y },
        end: { x: MARGIN + CONTENT_WIDTH, y: this.y },
        thickness: 0.75,
        color: ACCENT,
      });
    }
    this.y -= 6;
    this.pageHasContent = true;
  }

  private drawTable(rows: ReadonlyArray<TableRow>): void {
    const valueWidth = CONTENT_WIDTH - LABEL_COLUMN;
    const lh = lineHeight(SIZE.body);

    for (const [label, value] of rows) {
      let labelLines = this.wrap(this.bold, SIZE.body, label, LABEL_COLUMN - 2 * CELL_PADDING);
      let valueLines = this.wrap(this.regular, SIZE.body, value, valueWidth - 2 * CELL_PADDING);

      // Tall rows continue on the next page, one slice per page
      while (labelLines.length > 0 || valueLines.length > 0) {
        const page = this.reserve(lh + 2 * CELL_PADDING);
        const fit = Math.max(1, Math.floor((this.remaining() - 2 * CELL_PADDING) / lh));
        const labelSlice = labelLines.slice(0, fit);
        const valueSlice = valueLines.slice(0, fit);
        labelLines = labelLines.slice(fit);
        valueLines = valueLines.slice(fit);

        const rowHeight = Math.max(labelSlice.length, valueSlice.length, 1) * lh + 2 * CELL_PADDING;
        const bottom = this.y - rowHeight;

        page.drawRectangle({
          x: MARGIN,
          y: bottom,
          width: LABEL_COLUMN,
          height: rowHeight,
          color: LABEL_FILL,
          borderColor: BORDER,
          borderWidth: 0.5,
        });
        page.drawRectangle({
          x: MARGIN + LABEL_COLUMN,
          y: bottom,
          width: valueWidth,
          height: rowHeight,
          borderColor: BORDER,
          borderWidth: 0.5,
        });
        this.drawLines(page, labelSlice, MARGIN + CELL_PADDING, this.y - CELL_PADDING, this.bold, SIZE.body);
        this.drawLines(
          page,
          valueSlice,
          MARGIN + LABEL_COLUMN + CELL_PADDING,
          this.y - CELL_PADDING,
          this.regular,
          SIZE.body,
        );

        this.y = bottom;
        this.pageHasContent = true;
      }
    }
    this.y -= 10;
  }

  private drawParagraph(label: string | null, text: string): void {
    const lh = lineHeight(SIZE.body);

    if (label) {
      const page = this.reserve(2 * lh);
      this.drawLines(page, [this.clean(`${label}:`)], MARGIN, this.y, this.bold, SIZE.body);
      this.y -= lh;
      this.pageHasContent = true;
    }

    for (const line of this.wrap(this.regular, SIZE.body, text, CONTENT_WIDTH)) {
      const page = this.reserve(lh);
      this.drawLines(page, [line], MARGIN, this.y, this.regular, SIZE.body);
      this.y -= lh;
      this.pageHasContent = true;
    }
    this.y -= 8;
  }

  private captionWidth(): number {
    return CONTENT_WIDTH - PHOTO_BOX.width - PHOTO_GUTTER;
  }

  private captionLines(caption: string[]): CaptionLine[] {
    const lines: CaptionLine[] = [];
    caption.forEach((part, i) => {
      const font = i === 0 ? this.bold : this.regular;
      const color = i === 0 ? TEXT : MUTED;
      for (const text of this.wrap(font, SIZE.caption, part, this.captionWidth())) {
        lines.push({ text, font, color });
      }
    });
    return lines;
  }

  /**
   * One photo row: the box on the left, caption on the right. A caption
   * longer than the page continues in the caption column of the next pages.
   */
  private drawPhotoRow(
    boxHeight: number,
    caption: string[],
    drawBox: (page: PDFPage, top: number) => void,
  ): void {
    const lh = lineHeight(SIZE.caption);
    const x = MARGIN + PHOTO_BOX.width + PHOTO_GUTTER;
    let lines = this.captionLines(caption);

    let page = this.reserve(Math.max(boxHeight, lines.length * lh) + 12);
    drawBox(page, this.y);
    let bottom = this.y - boxHeight;

    while (lines.length > 0) {
      const fit = Math.max(1, Math.floor(this.remaining() / lh));
      const slice = lines.slice(0, fit);
      lines = lines.slice(fit);
      slice.forEach((line, i) => {
        page.drawText(line.text, {
          x,
          y: this.y - SIZE.caption - i * lh,
          size: SIZE.caption,
          font: line.font,
          color: line.color,
        });
      });
      bottom = Math.min(bottom, this.y - slice.length * lh);
      if (lines.length > 0) {
        page = this.newPage();
        bottom = this.y;
      }
    }

    this.y = bottom - 12;
    this.pageHasContent = true;
  }

  private drawPhoto(image: PDFImage, size: Size, caption: string[]): void {
    this.drawPhotoRow(size.height, caption, (page, top) => {
      page.drawImage(image, { x: MARGIN, y: top - size.height, width: size.width, height: size.height });
    });
  }

  private drawPhotoPlaceholder(message: string, caption: string[]): void {
    this.drawPhotoRow(PLACEHOLDER_HEIGHT, caption, (page, top) => {
      page.drawRectangle({
        x: MARGIN,
        y: top - PLACEHOLDER_HEIGHT,
        width: PHOTO_BOX.width,
        height: PLACEHOLDER_HEIGHT,
        borderColor: BORDER,
        borderWidth: 0.75,
        borderDashArray: [3, 3],
      });
      const lines = this.wrap(this.regular, SIZE.caption, message, PHOTO_BOX.width - 2 * CELL_PADDING);
      this.drawLines(
        page,
        lines,
        MARGIN + CELL_PADDING,
        top - (PLACEHOLDER_HEIGHT - lines.length * lineHeight(SIZE.caption)) / 2,
        this.regular,
        SIZE.caption,
        MUTED,
      );
    });
  }
}
