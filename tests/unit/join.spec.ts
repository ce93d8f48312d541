import { describe, it, expect } from "vitest";
import { ATTACHMENT_FIELDS, LIST_FIELDS } from "@/lib/case-export/constants";
import { CaseExportError } from "@/lib/case-export/errors";
import { joinCaseTables, splitDocumentRow, type JoinOptions } from "@/lib/case-export/join";
import { createMemorySourceFactory, MemoryRowSource } from "@/lib/case-export/sources";
import type { RawRow, RecordNode, TableName } from "@/lib/case-export/types";
import { RecordingObserver } from "../utils/recording-observer";

const CASES: RawRow[] = [
  { SagsNr: "S-1", Titel: "Vejsag" },
  { SagsNr: "S-2", Titel: "Klage" },
  { SagsNr: "S-3", Titel: "Byggesag" },
];

function docRow(documentId: string, caseNumber: string, attachmentId = "", title = "Brev"): RawRow {
  return {
    dokument_id: documentId,
    SagsNr: caseNumber,
    Titel: title,
    cdw_id: attachmentId,
    cdwDocumentUniqueID: attachmentId ? `U-${attachmentId}` : "",
    cdwCreatedDate: attachmentId ? "2023-05-01" : "",
    From1: attachmentId ? "from@example.com" : "",
    PostedDate: attachmentId ? "2023-05-02" : "",
    SendTo: attachmentId ? "to@example.com" : "",
    CopyTo: "",
    BlindCopyTo: "",
    Subject: attachmentId ? `Emne ${attachmentId}` : "",
    cdwBody: attachmentId ? "Tekst" : "",
  };
}

function fileRow(kind: string, ownerId: string, name: string): RawRow {
  return { notes_template_name: kind, notes_template_id: ownerId, filnavn: name };
}

function runJoin(
  tables: Partial<Record<TableName, RawRow[]>>,
  options: Partial<JoinOptions> = {}
) {
  const observer = new RecordingObserver();
  const session = joinCaseTables(
    createMemorySourceFactory({ cases: CASES, ...tables }),
    {
      listFields: LIST_FIELDS.standard,
      duplicateCases: "first",
      attachmentFields: ATTACHMENT_FIELDS,
      ...options,
    },
    { runId: "run-1", now: () => 0, observer }
  );
  return { session, observer };
}

function list(record: RecordNode, field: string): RecordNode[] {
  const value = record[field];
  if (!Array.isArray(value)) {
    throw new Error(`${field} is not a list`);
  }
  return value;
}

describe("joinCaseTables", () => {
  it("keeps one document per id and appends every attachment in order", () => {
    const { session } = runJoin({
      documents: [docRow("D1", "S-1", "C1"), docRow("D1", "S-1", "C2", "Ny titel")],
    });

    expect(session.documents).toHaveLength(1);
    expect(session.stats.documentRows).toBe(2);
    expect(session.stats.attachments).toBe(2);

    const documents = list(session.cases[0], "documents");
    expect(documents).toHaveLength(1);
    expect(documents[0].Titel).toBe("Brev");
    expect(list(documents[0], "attachments").map((a) => a.cdw_id)).toEqual(["C1", "C2"]);
  });

  it("adds files only to owners that have matching file rows", () => {
    const { session } = runJoin({
      files: [
        fileRow("dokument", "D1", "a.pdf"),
        fileRow("cdw", "C1", "b.pdf"),
        fileRow("dokument", "D1", "c.pdf"),
        fileRow("notat", "N1", "d.txt"),
      ],
      documents: [docRow("D1", "S-1", "C1"), docRow("D2", "S-1", "C2")],
      notes: [
        { notat_id: "N1", SagsNr: "S-2", Tekst: "Ring" },
        { notat_id: "N2", SagsNr: "S-2", Tekst: "Skriv" },
      ],
    });

    const [d1, d2] = session.documents;
    expect(d1.files).toEqual([
      fileRow("dokument", "D1", "a.pdf"),
      fileRow("dokument", "D1", "c.pdf"),
    ]);
    expect("files" in d2).toBe(false);

    expect(list(d1, "attachments")[0].files).toEqual([fileRow("cdw", "C1", "b.pdf")]);
    expect("files" in list(d2, "attachments")[0]).toBe(false);

    const [n1, n2] = list(session.cases[1], "notes");
    expect(n1.files).toEqual([fileRow("notat", "N1", "d.txt")]);
    expect("files" in n2).toBe(false);

    for (const record of session.cases) {
      expect("files" in record).toBe(false);
    }
  });

  it("drops documents and notes whose case is missing and reports the key", () => {
    const { session, observer } = runJoin({
      documents: [docRow("D1", "S-9"), docRow("D2", "S-2")],
      notes: [{ notat_id: "N1", SagsNr: "S-8", Tekst: "?" }],
    });

    const attached = session.cases.flatMap((record) =>
      "documents" in record ? list(record, "documents") : []
    );
    expect(attached.map((d) => d.dokument_id)).toEqual(["D2"]);
    expect(session.cases.some((record) => "notes" in record)).toBe(false);

    expect(observer.orphans.map((o) => [o.table, o.key, o.listField])).toEqual([
      ["documents", "S-9", "documents"],
      ["notes", "S-8", "notes"],
    ]);
    expect(observer.orphans[0].record.dokument_id).toBe("D1");
    expect(session.stats.orphans).toEqual({ documents: 1, attachments: 0, notes: 1 });
  });

  it("files a note's file only under that note, whatever ids the other tables use", () => {
    const { session } = runJoin({
      files: [fileRow("notat", "X1", "note.txt"), fileRow("dokument", "X1", "doc.pdf")],
      documents: [docRow("X1", "S-1", "X1")],
      notes: [{ notat_id: "X1", SagsNr: "S-1", Tekst: "Note" }],
    });

    const [document] = list(session.cases[0], "documents");
    const [attachment] = list(document, "attachments");
    const [note] = list(session.cases[0], "notes");

    expect(document.files).toEqual([fileRow("dokument", "X1", "doc.pdf")]);
    expect("files" in attachment).toBe(false);
    expect(note.files).toEqual([fileRow("notat", "X1", "note.txt")]);
  });

  it("keeps the case table order regardless of reference order", () => {
    const { session } = runJoin({
      documents: [docRow("D1", "S-3"), docRow("D2", "S-2"), docRow("D3", "S-1")],
      notes: [{ notat_id: "N1", SagsNr: "S-3", Tekst: "x" }],
    });

    expect(session.cases.map((record) => record.SagsNr)).toEqual(["S-1", "S-2", "S-3"]);
    expect(Object.keys(session.cases[2])).toEqual(["SagsNr", "Titel", "documents", "notes"]);
  });

  it("splits attachment columns from document columns without losing any", () => {
    const { session } = runJoin({ documents: [docRow("D1", "S-1", "C1")] });

    const [document] = session.documents;
    const [attachment] = list(document, "attachments");

    expect(Object.keys(document)).toEqual(["dokument_id", "SagsNr", "Titel", "attachments"]);
    expect(Object.keys(attachment)).toEqual([...ATTACHMENT_FIELDS]);
    expect(attachment.Subject).toBe("Emne C1");
  });

  it("adds no attachment for a row with an empty attachment id", () => {
    const { session } = runJoin({ documents: [docRow("D1", "S-1")] });

    expect("attachments" in session.documents[0]).toBe(false);
    expect(session.stats.attachments).toBe(0);
  });

  it("uses the legacy list names when asked", () => {
    const { session } = runJoin(
      {
        files: [fileRow("dokument", "D1", "a.pdf")],
        documents: [docRow("D1", "S-1", "C1")],
        notes: [{ notat_id: "N1", SagsNr: "S-1", Tekst: "x" }],
      },
      { listFields: LIST_FIELDS.legacy }
    );

    expect(Object.keys(session.cases[0])).toEqual(["SagsNr", "Titel", "dokumentListe", "notatListe"]);
    expect(Object.keys(session.documents[0])).toEqual([
      "dokument_id",
      "SagsNr",
      "Titel",
      "filListe",
      "cdwListe",
    ]);
  });

  it("reports every pass in order", () => {
    const { observer } = runJoin({});

    expect(observer.steps.map((s) => s.step)).toEqual([
      "index_files",
      "list_cases",
      "split_documents",
      "attach_documents",
      "attach_notes",
    ]);
    expect(observer.steps.every((s) => s.ok)).toBe(true);
  });
});

describe("file index", () => {
  it("aborts on an unknown owner kind and still closes the file source", () => {
    const files = new MemoryRowSource("files", [
      fileRow("dokument", "D1", "a.pdf"),
      fileRow("sag", "S-1", "b.pdf"),
    ]);
    const observer = new RecordingObserver();

    let thrown: unknown;
    try {
      joinCaseTables(
        (table) => (table === "files" ? files : new MemoryRowSource(table, [])),
        {
          listFields: LIST_FIELDS.standard,
          duplicateCases: "first",
          attachmentFields: ATTACHMENT_FIELDS,
        },
        { runId: "run-1", now: () => 0, observer }
      );
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(CaseExportError);
    expect(thrown).toMatchObject({
      code: "UNKNOWN_OWNER_KIND",
      message: 'Unrecognized file owner kind "sag" in file row 2',
    });
    expect(files.isClosed()).toBe(true);
    expect(observer.steps).toEqual([
      {
        step: "index_files",
        ok: false,
        data: { error: 'Unrecognized file owner kind "sag" in file row 2' },
      },
    ]);
  });
});

describe("case list", () => {
  const duplicated: RawRow[] = [
    { SagsNr: "S-1", Titel: "Foerste" },
    { SagsNr: "S-1", Titel: "Anden" },
  ];

  it("points a duplicate case number at the first row by default", () => {
    const { session, observer } = runJoin({
      cases: duplicated,
      documents: [docRow("D1", "S-1")],
    });

    expect(session.cases).toHaveLength(2);
    expect("documents" in session.cases[0]).toBe(true);
    expect("documents" in session.cases[1]).toBe(false);
    expect(observer.duplicates).toEqual([{ key: "S-1", policy: "first" }]);
    expect(session.stats.duplicateCases).toBe(1);
  });

  it("points a duplicate case number at the last row under the last policy", () => {
    const { session } = runJoin(
      { cases: duplicated, documents: [docRow("D1", "S-1")] },
      { duplicateCases: "last" }
    );

    expect("documents" in session.cases[0]).toBe(false);
    expect(list(session.cases[1], "documents")).toHaveLength(1);
  });

  it("rejects a duplicate case number under the reject policy", () => {
    expect(() => runJoin({ cases: duplicated }, { duplicateCases: "reject" })).toThrow(
      "Duplicate case number S-1 in case table"
    );
  });
});

describe("splitDocumentRow", () => {
  it("normalizes missing values to empty strings", () => {
    const { document, attachment } = splitDocumentRow(
      { dokument_id: "D1", Titel: null, cdw_id: undefined, Subject: "Hej" },
      ATTACHMENT_FIELDS
    );

    expect(document).toEqual({ dokument_id: "D1", Titel: "" });
    expect(attachment).toEqual({ cdw_id: "", Subject: "Hej" });
  });
});
