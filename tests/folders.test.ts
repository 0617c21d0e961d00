import { describe, it, expect } from "vitest";
import {
  getFolderContents,
  groupByFolder,
  normalizeFolderPath,
  parentFolder,
} from "../src/server/listing/folders.js";
import { formatSize } from "../src/server/listing/format.js";
import { makeRecord } from "./test-utils.js";

const records = [
  makeRecord("readme.md", 10),
  makeRecord("photos/2024/beach.jpg", 300),
  makeRecord("photos/cat.jpg", 200),
  makeRecord("docs/guide.pdf", 50),
  makeRecord("photos/", 0),
  makeRecord("archive.zip", 5),
];

describe("getFolderContents", () => {
  it("should list root folders and files sorted by name", () => {
    const contents = getFolderContents(records);

    expect(contents.path).toBe("");
    expect(contents.folders).toEqual([
      { name: "docs", path: "docs", fileCount: 1, totalSize: 50 },
      { name: "photos", path: "photos", fileCount: 3, totalSize: 500 },
    ]);
    expect(contents.files.map((file) => file.name)).toEqual(["archive.zip", "readme.md"]);
  });

  it("should list one level below a folder", () => {
    const contents = getFolderContents(records, "photos/");

    expect(contents.path).toBe("photos");
    expect(contents.folders).toEqual([
      { name: "2024", path: "photos/2024", fileCount: 1, totalSize: 300 },
    ]);
    expect(contents.files).toEqual([{ name: "cat.jpg", record: records[2] }]);
  });

  it("should return nothing for an unknown folder", () => {
    expect(getFolderContents(records, "missing")).toEqual({ path: "missing", folders: [], files: [] });
  });

  it("should group from the root", () => {
    expect(groupByFolder(records)).toEqual(getFolderContents(records, ""));
  });
});

describe("folder paths", () => {
  it("should normalize slashes", () => {
    expect(normalizeFolderPath("/photos//2024/")).toBe("photos/2024");
  });

  it("should find the parent folder", () => {
    expect(parentFolder("photos/2024")).toBe("photos");
    expect(parentFolder("photos")).toBe("");
  });
});

describe("formatSize", () => {
  it("should format sizes with binary units", () => {
    expect(formatSize(0)).toBe("0 B");
    expect(formatSize(1023)).toBe("1023 B");
    expect(formatSize(1536)).toBe("1.5 KB");
    expect(formatSize(5 * 1024 * 1024)).toBe("5.0 MB");
    expect(formatSize(3 * 1024 * 1024 * 1024)).toBe("3.0 GB");
  });
});
