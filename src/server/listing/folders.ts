import type { ObjectRecord } from "../types.js";

export type FolderSummary = {
  name: string;
  path: string;
  fileCount: number;
  totalSize: number;
};

export type FolderFile = {
  name: string;
  record: ObjectRecord;
};

export type FolderContents = {
  path: string;
  folders: FolderSummary[];
  files: FolderFile[];
};

const byName = <T extends { name: string }>(a: T, b: T): number => {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
};

export const normalizeFolderPath = (path: string): string => {
  return path
    .split("/")
    .filter(Boolean)
    .join("/");
};

export const parentFolder = (path: string): string => {
  const normalized = normalizeFolderPath(path);
  const lastSlash = normalized.lastIndexOf("/");
  return lastSlash === -1 ? "" : normalized.slice(0, lastSlash);
};

/**
 * Immediate subfolders and direct files below `folderPath` ("" for the root).
 * Folder markers (keys equal to the folder prefix) are not listed as files.
 */
export const getFolderContents = (
  records: readonly ObjectRecord[],
  folderPath = "",
): FolderContents => {
  const path = normalizeFolderPath(folderPath);
  const prefix = path ? `${path}/` : "";
  const folders = new Map<string, FolderSummary>();
  const files: FolderFile[] = [];

  for (const record of records) {
    if (!record.key.startsWith(prefix)) {
      continue;
    }

    const relativePath = record.key.slice(prefix.length);
    if (!relativePath) {
      continue;
    }

    const slash = relativePath.indexOf("/");
    if (slash === -1) {
      files.push({ name: relativePath, record });
      continue;
    }

    const name = relativePath.slice(0, slash);
    const folder = folders.get(name) ?? {
      name,
      path: `${prefix}${name}`,
      fileCount: 0,
      totalSize: 0,
    };
    folder.fileCount += 1;
    folder.totalSize += record.size;
    folders.set(name, folder);
  }

  return {
    path,
    folders: [...folders.values()].sort(byName),
    files: files.sort(byName),
  };
};

export const groupByFolder = (records: readonly ObjectRecord[]): FolderContents => {
  return getFolderContents(records, "");
};
