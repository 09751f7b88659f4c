import path from "path";
import { pathToFileURL } from "url";
import * as mammoth from "mammoth";

export type DocumentKind = "PDF" | "DOCX" | "TEXT" | "UNKNOWN";

export type ExtractedText = {
  kind: DocumentKind;
  text: string;
  pageCount: number;
  isScanned: boolean;
  warnings: string[];
};

// Tunables
const PDF_PAGE_TIMEOUT_MS = 15000;
const MIN_TOTAL_TEXT = 50;
const MAX_PAGES_GUARD = 500;
const PDF_PAGE_CONCURRENCY = 6;
const LINE_Y_TOL = 4; // tolerance bucket for "same line" grouping
const SPACE_X_GAP = 3;

const TEXT_EXTS = new Set([".txt", ".csv", ".text"]);

export function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const t = setTimeout(() => reject(new Error(`Timeout: ${label} (${ms}ms)`)), ms);
    p.then(
      (v) => {
        clearTimeout(t);
        resolve(v);
      },
      (e) => {
        clearTimeout(t);
        reject(e);
      }
    );
  });
}

/** Run tasks with at most `limit` in flight; results keep task order. */
export async function runWithLimit<T>(tasks: Array<() => Promise<T>>, limit: number): Promise<T[]> {
  const results: T[] = new Array(tasks.length);
  let next = 0;

  async function worker() {
    while (true) {
      const i = next++;
      if (i >= tasks.length) return;
      results[i] = await tasks[i]();
    }
  }

  const n = Math.max(1, Math.min(limit, tasks.length || 1));
  await Promise.all(Array.from({ length: n }, () => worker()));
  return results;
}

export type PositionedText = { text: string; x: number; y: number; w: number };

/**
 * Rebuild reading-order lines from positioned PDF text items.
 *  - Sort once by y DESC
 *  - Bucket into lines by y tolerance (LINE_Y_TOL), then order each line by x
 *  - Within a line, insert spaces based on x gap heuristics
 * Table cells on one row end up on one line, which is what the grade parser expects.
 */
export function itemsToText(items: PositionedText[]): string {
  const norm = items
    .map((it) => ({ ...it, text: it.text.replace(/\s+/g, " ").trim() }))
    .filter((it) => it.text);

  norm.sort((a, b) => {
    const ay = Number.isFinite(a.y) ? a.y : -Infinity;
    const by = Number.isFinite(b.y) ? b.y : -Infinity;
    return by - ay;
  });

  const rows: PositionedText[][] = [];
  let curY: number | null = null;
  for (const it of norm) {
    const row = rows[rows.length - 1];
    if (row && curY !== null && !(Number.isFinite(it.y) && Math.abs(it.y - curY) > LINE_Y_TOL)) {
      row.push(it);
      continue;
    }
    rows.push([it]);
    curY = it.y;
  }

  const lines: string[] = [];
  for (const row of rows) {
    row.sort((a, b) => a.x - b.x);
    let cur = "";
    let lastX: number | null = null;
    for (const it of row) {
      if (cur.length > 0 && lastX !== null) {
        const xGap = it.x - lastX;
        const needsSpace = xGap > SPACE_X_GAP && !/[\s([{"'/]$/.test(cur) && !/^[,.;:!?)}\]"']/.test(it.text);
        if (needsSpace) cur += " ";
      }
      cur += it.text;
      lastX = it.x + (it.w || 0);
    }
    const s = cur.replace(/\s+/g, " ").trimEnd();
    if (s) lines.push(s);
  }
  return lines.join("\n");
}

async function extractPdf(bytes: Uint8Array): Promise<ExtractedText> {
  const warnings: string[] = [];
  const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");

  // pdfjs needs a workerSrc even in Node, where it runs a "fake worker".
  const pdfjsRoot = path.join(process.cwd(), "node_modules", "pdfjs-dist");
  pdfjs.GlobalWorkerOptions.workerSrc = pathToFileURL(path.join(pdfjsRoot, "legacy", "build", "pdf.worker.mjs")).toString();

  const loadingTask = pdfjs.getDocument({
    data: new Uint8Array(bytes),
    useSystemFonts: true,
    isEvalSupported: false,
    standardFontDataUrl: pathToFileURL(path.join(pdfjsRoot, "standard_fonts") + path.sep).toString(),
  });
  const doc = await withTimeout(loadingTask.promise, PDF_PAGE_TIMEOUT_MS, "pdf.getDocument()").catch(async (e: unknown) => {
    await loadingTask.destroy();
    throw e;
  });

  try {
    const numPages = doc.numPages;
    if (numPages > MAX_PAGES_GUARD) {
      throw new Error(`PDF too large (${numPages} pages). Guard=${MAX_PAGES_GUARD}`);
    }

    const tasks = Array.from({ length: numPages }, (_, idx) => async () => {
      const pageNumber = idx + 1;
      const page = await withTimeout(doc.getPage(pageNumber), PDF_PAGE_TIMEOUT_MS, `pdf.getPage(${pageNumber})`);
      const tc = await withTimeout(page.getTextContent(), PDF_PAGE_TIMEOUT_MS, `pdf.getTextContent(${pageNumber})`);
      const items: PositionedText[] = [];
      for (const it of tc.items) {
        if (!("str" in it)) continue;
        items.push({
          text: it.str,
          x: Number(it.transform[4] ?? 0),
          y: Number(it.transform[5] ?? 0),
          w: Number(it.width || 0),
        });
      }
      return itemsToText(items);
    });

    const pages = await runWithLimit(tasks, PDF_PAGE_CONCURRENCY);
    const text = pages.join("\n");
    const isScanned = text.replace(/\s+/g, "").length < MIN_TOTAL_TEXT;
    warnings.push(`pdfjs: pages=${pages.length}, chars=${text.length}`);
    if (isScanned) warnings.push("PDF looks scanned/image-only.");

    return { kind: "PDF", text, pageCount: numPages, isScanned, warnings };
  } finally {
    await doc.destroy();
  }
}

async function extractDocx(bytes: Uint8Array): Promise<ExtractedText> {
  const result = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
  const text = (result.value ?? "").trim();
  return {
    kind: "DOCX",
    text,
    pageCount: 1,
    isScanned: false,
    warnings: result.messages.map((m) => `mammoth: ${m.message}`),
  };
}

export function documentKindOf(filename: string): DocumentKind {
  const ext = path.extname(filename || "").toLowerCase();
  if (ext === ".pdf") return "PDF";
  if (ext === ".docx") return "DOCX";
  if (TEXT_EXTS.has(ext)) return "TEXT";
  return "UNKNOWN";
}

/** Decode an uploaded file into plain text. Throws when the file cannot be read. */
export async function extractDocumentText(filename: string, bytes: Uint8Array): Promise<ExtractedText> {
  const kind = documentKindOf(filename);
  if (kind === "PDF") return extractPdf(bytes);
  if (kind === "DOCX") return extractDocx(bytes);
  if (kind === "TEXT") {
    const text = new TextDecoder("utf-8").decode(bytes);
    return { kind, text, pageCount: 1, isScanned: false, warnings: [] };
  }
  return {
    kind: "UNKNOWN",
    text: "",
    pageCount: 0,
    isScanned: false,
    warnings: [`Unsupported file type: ${path.extname(filename || "") || "(none)"}`],
  };
}
