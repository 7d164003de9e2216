import { readFile } from "node:fs/promises";

import type { WorkItem } from "@/lib/harvest/types";

export const WORK_LIST_COLUMNS = [
  "name",
  "num_downloads",
  "owners_and_repo",
] as const;

export type WorkListParseResult = {
  items: WorkItem[];
  warnings: string[];
};

export function splitCsvLine(line: string): string[] {
  const result: string[] = [];
  let buffer = "";
  let insideQuotes = false;

  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];

    if (char === '"') {
      if (insideQuotes && line[index + 1] === '"') {
        buffer += '"';
        index += 1;
      } else {
        insideQuotes = !insideQuotes;
      }
      continue;
    }

    if (char === "," && !insideQuotes) {
      result.push(buffer.trim());
      buffer = "";
      continue;
    }

    buffer += char;
  }

  result.push(buffer.trim());
  return result;
}

function parseDownloads(value: string | undefined) {
  if (!value) {
    return null;
  }

  const downloads = Number.parseInt(value.replace(/[,_\s]/g, ""), 10);
  return Number.isFinite(downloads) ? downloads : null;
}

function splitOwnerAndRepo(value: string) {
  const separator = value.indexOf("/");
  if (separator < 0) {
    return null;
  }

  const owner = value.slice(0, separator).trim();
  const name = value.slice(separator + 1).trim();
  return owner && name ? { owner, name } : null;
}

/**
 * Parses the `name,num_downloads,owners_and_repo` work list. Unusable rows
 * become warnings; a header without the required columns is an error.
 */
export function parseWorkList(content: string): WorkListParseResult {
  const lines = content.replace(/^﻿/, "").split(/\r?\n/);
  const headerIndex = lines.findIndex((line) => line.trim().length > 0);
  if (headerIndex < 0) {
    return { items: [], warnings: [] };
  }

  const header = splitCsvLine(lines[headerIndex]).map((column) =>
    column.toLowerCase(),
  );
  const missing = WORK_LIST_COLUMNS.filter(
    (column) => !header.includes(column),
  );
  if (missing.length) {
    throw new Error(
      `Work list must contain the columns ${WORK_LIST_COLUMNS.join(", ")}; missing ${missing.join(", ")}.`,
    );
  }

  const nameColumn = header.indexOf("name");
  const downloadsColumn = header.indexOf("num_downloads");
  const repoColumn = header.indexOf("owners_and_repo");

  const items: WorkItem[] = [];
  const warnings: string[] = [];
  for (let lineIndex = headerIndex + 1; lineIndex < lines.length; lineIndex += 1) {
    const line = lines[lineIndex];
    if (!line.trim()) {
      continue;
    }

    const lineNumber = lineIndex + 1;
    const values = splitCsvLine(line);
    const displayName = values[nameColumn] ?? "";
    const ownerAndRepo = values[repoColumn] ?? "";

    if (!displayName) {
      warnings.push(`Line ${lineNumber}: skipping row without a name.`);
      continue;
    }

    const target = splitOwnerAndRepo(ownerAndRepo);
    if (!target) {
      warnings.push(
        `Line ${lineNumber}: skipping ${displayName}, invalid owners_and_repo "${ownerAndRepo}".`,
      );
      continue;
    }

    items.push({
      ...target,
      displayName,
      downloads: parseDownloads(values[downloadsColumn]),
    });
  }

  return { items, warnings };
}

export async function readWorkList(filePath: string) {
  const content = await readFile(filePath, "utf8");
  return parseWorkList(content);
}
