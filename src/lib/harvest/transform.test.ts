import { describe, expect, it } from "vitest";

import type { RepositoryNode } from "@/lib/github/repository-payload";

import { transformRepository } from "@/lib/harvest/transform";

const EXTRACTED_AT = new Date("2024-05-01T12:00:00.000Z");

const repository: RepositoryNode = {
  id: "R_kgDOTest",
  name: "widgets",
  owner: { login: "octo" },
  description: "Widget toolkit",
  stargazerCount: 12,
  forkCount: 3,
  primaryLanguage: { name: "TypeScript" },
  createdAt: "2020-01-02T03:04:05Z",
  pushedAt: "2024-04-30T10:00:00Z",
  licenseInfo: { name: "MIT License" },
  isArchived: false,
  isDisabled: false,
  isFork: true,
  url: "https://github.com/octo/widgets",
  repositoryTopics: {
    nodes: [
      { topic: { name: "widgets" } },
      { topic: { name: " ui " } },
      null,
      { topic: { name: "widgets" } },
      { topic: null },
    ],
  },
};

describe("transformRepository", () => {
  it("flattens a repository node into a project record", () => {
    expect(transformRepository(repository, EXTRACTED_AT)).toEqual({
      ok: true,
      record: {
        id: "R_kgDOTest",
        name: "widgets",
        ownerLogin: "octo",
        description: "Widget toolkit",
        stargazerCount: 12,
        forkCount: 3,
        primaryLanguage: "TypeScript",
        createdAt: new Date("2020-01-02T03:04:05Z"),
        pushedAt: new Date("2024-04-30T10:00:00Z"),
        licenseName: "MIT License",
        isArchived: false,
        isDisabled: false,
        isFork: true,
        url: "https://github.com/octo/widgets",
        lastExtractedAt: EXTRACTED_AT,
        topics: ["widgets", "ui"],
      },
    });
  });

  it("maps absent optional fields to null", () => {
    const result = transformRepository(
      {
        id: "R_kgDOBare",
        name: "bare",
        owner: { login: "octo" },
        primaryLanguage: null,
        licenseInfo: null,
        createdAt: null,
      },
      EXTRACTED_AT,
    );

    expect(result).toEqual({
      ok: true,
      record: {
        id: "R_kgDOBare",
        name: "bare",
        ownerLogin: "octo",
        description: null,
        stargazerCount: null,
        forkCount: null,
        primaryLanguage: null,
        createdAt: null,
        pushedAt: null,
        licenseName: null,
        isArchived: null,
        isDisabled: null,
        isFork: null,
        url: null,
        lastExtractedAt: EXTRACTED_AT,
        topics: [],
      },
    });
  });

  it("rejects records without their essential identifiers", () => {
    expect(
      transformRepository({ ...repository, id: null, owner: null }, EXTRACTED_AT),
    ).toEqual({
      ok: false,
      reason:
        "Essential project data missing (id, owner.login) for https://github.com/octo/widgets.",
    });

    expect(
      transformRepository({ name: "  " }, EXTRACTED_AT),
    ).toEqual({
      ok: false,
      reason:
        "Essential project data missing (id, name, owner.login) for unknown repository.",
    });
  });

  it("rejects unparseable timestamps", () => {
    expect(
      transformRepository({ ...repository, pushedAt: "yesterday" }, EXTRACTED_AT),
    ).toEqual({ ok: false, reason: 'Unparseable pushedAt timestamp "yesterday".' });
  });
});
