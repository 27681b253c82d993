import { describe, it, expect } from "vitest";
import { comparePageDigits, groupFiles, partitionFiles } from "./group-files";
import { classifyFile } from "./classify-file";
import { sourceFile } from "../test-helpers";

const names = (files: { name: string }[]) => files.map((file) => file.name);

describe("classifyFile", () => {
  it("classifies by case-insensitive extension", () => {
    expect(classifyFile("scan.PNG")).toBe("image");
    expect(classifyFile("photo.jpeg")).toBe("image");
    expect(classifyFile("report.pdf")).toBe("document");
    expect(classifyFile("letter.DOCX")).toBe("document");
    expect(classifyFile("notes.txt")).toBe("other");
    expect(classifyFile("README")).toBe("other");
  });
});

describe("groupFiles", () => {
  it("puts pages sharing a key into one group, in page order", () => {
    const files = ["doc3.png", "doc1.png", "doc10.png", "doc2.png"].map((n) => sourceFile(n));
    const groups = groupFiles(files, "image");

    expect(groups).toHaveLength(1);
    expect(groups[0].key).toBe("doc.png");
    expect(groups[0].kind).toBe("image");
    expect(names(groups[0].members)).toEqual(["doc1.png", "doc2.png", "doc3.png", "doc10.png"]);
  });

  it("orders groups by first appearance", () => {
    const files = ["b1.png", "a1.png", "b2.png", "a2.png"].map((n) => sourceFile(n));
    const groups = groupFiles(files, "image");

    expect(groups.map((g) => g.key)).toEqual(["b.png", "a.png"]);
    expect(names(groups[0].members)).toEqual(["b1.png", "b2.png"]);
    expect(names(groups[1].members)).toEqual(["a1.png", "a2.png"]);
  });

  it("makes a digit-less file page 0 of the matching numbered group", () => {
    const files = ["scan2.png", "scan.png", "scan1.png"].map((n) => sourceFile(n));
    const groups = groupFiles(files, "image");

    expect(groups).toHaveLength(1);
    expect(names(groups[0].members)).toEqual(["scan.png", "scan1.png", "scan2.png"]);
  });

  it("keeps digit-less files without numbered siblings as singletons", () => {
    const files = ["front.jpg", "back.jpg"].map((n) => sourceFile(n));
    const groups = groupFiles(files, "image");

    expect(groups.map((g) => g.key)).toEqual(["front.jpg", "back.jpg"]);
    expect(groups.every((g) => g.members.length === 1)).toBe(true);
  });

  it("keeps incoming order for equal page numbers", () => {
    const files = ["p01.png", "p1.png", "p2.png"].map((n) => sourceFile(n));
    const groups = groupFiles(files, "image");

    expect(names(groups[0].members)).toEqual(["p01.png", "p1.png", "p2.png"]);
  });

  it("orders page numbers too long for a double", () => {
    const files = ["scan_100000000000000000001.png", "scan_100000000000000000000.png"].map((n) =>
      sourceFile(n),
    );
    const groups = groupFiles(files, "image");

    expect(groups).toHaveLength(1);
    expect(names(groups[0].members)).toEqual([
      "scan_100000000000000000000.png",
      "scan_100000000000000000001.png",
    ]);
  });

  it("separates PDFs whose first digit runs leave different keys", () => {
    const files = ["invoice_2023-01.pdf", "invoice_2023-02.pdf"].map((n) => sourceFile(n));
    const groups = groupFiles(files, "document");

    expect(groups.map((g) => g.key)).toEqual(["invoice_-01.pdf", "invoice_-02.pdf"]);
  });
});

describe("comparePageDigits", () => {
  it("compares digit runs by numeric value", () => {
    expect(comparePageDigits("9", "10")).toBeLessThan(0);
    expect(comparePageDigits("010", "9")).toBeGreaterThan(0);
    expect(comparePageDigits("007", "7")).toBe(0);
    expect(comparePageDigits("", "0")).toBe(0);
    expect(comparePageDigits("", "1")).toBeLessThan(0);
  });
});

describe("partitionFiles", () => {
  it("splits images, documents and everything else", () => {
    const files = ["page1.png", "notes.txt", "contract.pdf", "page2.png", "data.csv"].map((n) =>
      sourceFile(n),
    );
    const { images, documents, other } = partitionFiles(files);

    expect(images).toHaveLength(1);
    expect(names(images[0].members)).toEqual(["page1.png", "page2.png"]);
    expect(documents.map((g) => g.key)).toEqual(["contract.pdf"]);
    expect(names(other)).toEqual(["notes.txt", "data.csv"]);
  });

  it("returns empty partitions for no files", () => {
    expect(partitionFiles([])).toEqual({ images: [], documents: [], other: [] });
  });
});
