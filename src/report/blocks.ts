/**
 * The intermediate document model. Composition produces a flat list of
 * blocks; the PDF writer lays them out. Everything structural about a report
 * (text, table values, order, forced page breaks) lives in this list, so two
 * renders of the same data can be compared through `outlineOf`.
 */

import type { Photo } from "../store/types.js";

export interface Size {
  width: number;
  height: number;
}

export type TableRow = readonly [label: string, value: string];

export type ReportBlock<TImage> =
  | { kind: "title"; title: string; subtitle: string }
  | { kind: "heading"; level: 1 | 2; text: string }
  | { kind: "table"; rows: TableRow[] }
  | { kind: "paragraph"; label: string | null; text: string }
  | { kind: "photo"; image: TImage; size: Size; caption: string[] }
  | { kind: "photo-missing"; message: string; caption: string[] }
  | { kind: "page-break" };

/** Result of loading one photo's image; failures carry the reason instead. */
export type PhotoOutcome<TImage> =
  | { ok: true; photo: Photo; image: TImage; width: number; height: number }
  | { ok: false; photo: Photo; reason: string };

function outlineLine<TImage>(block: ReportBlock<TImage>): string {
  switch (block.kind) {
    case "title":
      return `title: ${block.title} | ${block.subtitle}`;
    case "heading":
      return `h${block.level}: ${block.text}`;
    case "table":
      return `table: ${block.rows.map(([label, value]) => `${label}=${value}`).join("; ")}`;
    case "paragraph":
      return block.label ? `paragraph: ${block.label}: ${block.text}` : `paragraph: ${block.text}`;
    case "photo":
      return `photo: ${block.caption.join(" | ")} [${block.size.width.toFixed(1)}x${block.size.height.toFixed(1)}]`;
    case "photo-missing":
      return `photo-missing: ${block.message} | ${block.caption.join(" | ")}`;
    case "page-break":
      return "page-break";
  }
}

/** One line of text per block. */
export function outlineOf<TImage>(blocks: ReadonlyArray<ReportBlock<TImage>>): string[] {
  return blocks.map(outlineLine);
}
