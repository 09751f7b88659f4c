import { describe, expect, it } from "vitest";
import { extractDocumentText, type ExtractedText } from "@/lib/extraction";
import { defaultGpaConfig } from "@/lib/gpa/config";
import { GpaBatchError } from "@/lib/gpa/errors";
import { createGradeMapper } from "@/lib/gpa/gradeMapper";
import { processUploads, type TextExtractor, type UploadedDocument } from "@/lib/gpa/processUploads";

const config = defaultGpaConfig();
const mapper = createGradeMapper(config);

function upload(filename: string, text = ""): UploadedDocument {
  return { filename, bytes: new TextEncoder().encode(text) };
}

function textResult(text: string, overrides: Partial<ExtractedText> = {}): ExtractedText {
  return { kind: "PDF", text, pageCount: 1, isScanned: false, warnings: [], ...overrides };
}

function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

describe("processUploads", () => {
  it("decodes text uploads and uses a registration number in the filename", async () => {
    const outcome = await processUploads([upload("IT21234567_transcript.txt", "IT2020 A\nIT2030 B")], { config, mapper });
    expect(outcome.resultSet.rows.map((r) => [r.registrationNumber, r.gpa])).toEqual([["IT21234567", 3.5]]);
    expect(outcome.documents).toEqual([
      {
        documentId: "IT21234567_transcript.txt",
        layout: "transcript",
        registrationNumbers: ["IT21234567"],
        entryCount: 2,
        accepted: true,
        status: "accepted",
        discardedSections: 0,
      },
    ]);
  });

  it("turns files that cannot be used into anomalies and keeps the rest", async () => {
    const extractText: TextExtractor = async (filename, bytes) => {
      if (filename === "broken.docx") throw new Error("bad zip");
      if (filename === "scan.pdf") return textResult("", { isScanned: true });
      return extractDocumentText(filename, bytes);
    };
    const outcome = await processUploads(
      [
        upload("broken.docx"),
        upload("scan.pdf"),
        upload("notes.xyz", "IT2020 A"),
        upload("ok.txt", "Registration No: SE20000001\nIT2020 A"),
      ],
      { config, mapper, extractText }
    );
    expect(outcome.resultSet.rows.map((r) => r.registrationNumber)).toEqual(["SE20000001"]);
    expect(
      outcome.anomalies.map((a) => (a.kind === "STRUCTURAL_ANOMALY" ? [a.documentId, a.code, a.message] : [a.kind]))
    ).toEqual([
      ["broken.docx", "UNREADABLE_DOCUMENT", "Could not read the file: bad zip"],
      ["scan.pdf", "SCANNED_DOCUMENT", "The document has no text layer; scanned sheets are not supported."],
      ["notes.xyz", "UNSUPPORTED_FILE_TYPE", "Unsupported file type: .xyz"],
    ]);
    expect(outcome.documents.map((d) => [d.documentId, d.accepted])).toEqual([
      ["broken.docx", false],
      ["scan.pdf", false],
      ["notes.xyz", false],
      ["ok.txt", true],
    ]);
  });

  it("keeps upload order when later files finish decoding first", async () => {
    const extractText: TextExtractor = async (filename) => {
      if (filename === "first.pdf") {
        await delay(30);
        return textResult("Registration No: IT21000001\nIT2020 C");
      }
      return textResult("Registration No: IT21000002\nIT2020 C");
    };
    const outcome = await processUploads([upload("first.pdf"), upload("second.pdf")], { config, mapper, extractText });
    expect(outcome.resultSet.records.map((r) => [r.registrationNumber, r.rank, r.order])).toEqual([
      ["IT21000001", 1, 0],
      ["IT21000002", 1, 1],
    ]);
  });

  it("gives repeated filenames distinct document ids", async () => {
    const outcome = await processUploads(
      [upload("sheet.txt", "Registration No: IT21000001\nIT2020 A"), upload("sheet.txt", "Registration No: IT21000002\nIT2020 B")],
      { config, mapper }
    );
    expect(outcome.documents.map((d) => d.documentId)).toEqual(["sheet.txt", "sheet.txt (2)"]);
  });

  it("gives up on a file that takes too long to decode", async () => {
    const extractText: TextExtractor = (filename) =>
      filename === "slow.pdf"
        ? new Promise<ExtractedText>(() => undefined)
        : Promise.resolve(textResult("Registration No: IT21000001\nIT2020 A"));
    const outcome = await processUploads([upload("slow.pdf"), upload("fast.pdf")], {
      config,
      mapper,
      extractText,
      timeoutMs: 20,
    });
    expect(outcome.anomalies[0]).toMatchObject({
      documentId: "slow.pdf",
      code: "UNREADABLE_DOCUMENT",
      message: "Could not read the file: Timeout: decode slow.pdf (20ms)",
    });
    expect(outcome.resultSet.studentCount).toBe(1);
  });

  it("fails the batch when nothing could be used", async () => {
    await expect(processUploads([upload("notes.xyz", "IT2020 A")], { config, mapper })).rejects.toBeInstanceOf(
      GpaBatchError
    );
  });
});
