import { describe, expect, it } from "@effect/vitest";
import type { HistorySnapshot } from "../core/schema";
import { emptySnapshot } from "../state/store";
import { createRemoteItem } from "../test/helpers";
import {
  DEFAULT_RULES,
  classify,
  extensionOf,
  hasAllowedExtension,
  isAnswerKey,
} from "./classify";

const historyWith = (...ids: string[]): HistorySnapshot => ({
  lastCheckedAt: "2024-03-01T08:00:00.000Z",
  checkCount: 1,
  processedIds: new Set(ids),
});

describe("extensionOf", () => {
  it("should return the lower-cased text after the last dot", () => {
    expect(extensionOf("Turma A.Aluno 1.JPG")).toBe("jpg");
  });

  it("should return empty string when there is no dot", () => {
    expect(extensionOf("README")).toBe("");
  });

  it("should return empty string for a trailing dot", () => {
    expect(extensionOf("scan.")).toBe("");
  });
});

describe("isAnswerKey", () => {
  it("should match the marker case-insensitively anywhere in the name", () => {
    expect(isAnswerKey("prova-GABARITO-final.pdf", DEFAULT_RULES)).toBe(true);
    expect(isAnswerKey("Gabarito.png", DEFAULT_RULES)).toBe(true);
  });

  it("should not match ordinary card names", () => {
    expect(isAnswerKey("aluno-07.png", DEFAULT_RULES)).toBe(false);
  });

  it("should honour custom markers", () => {
    expect(isAnswerKey("answer-key.pdf", { ...DEFAULT_RULES, excludedMarkers: ["Answer-Key"] })).toBe(
      true
    );
  });
});

describe("hasAllowedExtension", () => {
  it("should accept every default extension in any case", () => {
    for (const name of ["a.pdf", "b.PNG", "c.Jpg", "d.jpeg"]) {
      expect(hasAllowedExtension(name, DEFAULT_RULES)).toBe(true);
    }
  });

  it("should reject other extensions", () => {
    expect(hasAllowedExtension("notes.docx", DEFAULT_RULES)).toBe(false);
    expect(hasAllowedExtension("archive.pdf.zip", DEFAULT_RULES)).toBe(false);
  });

  it("should accept configured extensions written with a leading dot", () => {
    expect(hasAllowedExtension("scan.tiff", { ...DEFAULT_RULES, allowedExtensions: [".tiff"] })).toBe(
      true
    );
  });
});

describe("classify", () => {
  it("should never include an id that is already processed", () => {
    const listing = [
      createRemoteItem("1", "aluno-1.png"),
      createRemoteItem("2", "aluno-2.png"),
      createRemoteItem("3", "aluno-3.png"),
    ];

    const batch = classify(listing, historyWith("1", "3"));

    expect(batch.map((item) => item.id)).toEqual(["2"]);
  });

  it("should exclude answer keys regardless of extension", () => {
    const listing = [
      createRemoteItem("k1", "gabarito.pdf"),
      createRemoteItem("k2", "GABARITO_turma_b.png"),
      createRemoteItem("c1", "aluno.jpg"),
    ];

    expect(classify(listing, emptySnapshot).map((item) => item.id)).toEqual(["c1"]);
  });

  it("should exclude unrecognized extensions even when unprocessed", () => {
    const listing = [
      createRemoteItem("1", "planilha.xlsx"),
      createRemoteItem("2", "foto.heic"),
      createRemoteItem("3", "cartao.jpeg"),
    ];

    expect(classify(listing, emptySnapshot).map((item) => item.id)).toEqual(["3"]);
  });

  it("should preserve the listing order of eligible items", () => {
    const listing = [
      createRemoteItem("z", "zeta.png"),
      createRemoteItem("skip", "gabarito.png"),
      createRemoteItem("a", "alpha.pdf"),
      createRemoteItem("m", "mu.jpg"),
    ];

    expect(classify(listing, emptySnapshot).map((item) => item.id)).toEqual(["z", "a", "m"]);
  });

  it("should be deterministic for identical inputs", () => {
    const listing = [createRemoteItem("1", "a.png"), createRemoteItem("2", "b.pdf")];
    const history = historyWith("2");

    expect(classify(listing, history)).toEqual(classify(listing, history));
  });

  it("should return an empty batch for an empty listing", () => {
    expect(classify([], emptySnapshot)).toEqual([]);
  });

  it("should not modify the listing", () => {
    const listing = [createRemoteItem("1", "gabarito.png"), createRemoteItem("2", "b.png")];
    classify(listing, emptySnapshot);
    expect(listing).toHaveLength(2);
  });
});
