// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { describe, test, expect, beforeAll, afterAll } from "vitest";
import { join } from "node:path";
import { normalizeUrlPath, resolveResource } from "../../src/http/resolve.js";
import { BadRequestError, NotFoundError } from "../../src/errors.js";
import { makeDocRoot, removeDocRoot } from "../helpers.js";

const INDEX = ["index.html", "index.htm"] as const;

describe("normalizeUrlPath", () => {
  test("splits into segments", () => {
    expect(normalizeUrlPath("/a/b/c.txt")).toEqual(["a", "b", "c.txt"]);
    expect(normalizeUrlPath("/")).toEqual([]);
  });

  test("collapses dot segments and empty segments", () => {
    expect(normalizeUrlPath("/a/./b//../c")).toEqual(["a", "c"]);
  });

  test("decodes percent-escapes", () => {
    expect(normalizeUrlPath("/caf%C3%A9/a%20b")).toEqual(["café", "a b"]);
  });

  test("refuses to climb above the root", () => {
    expect(() => normalizeUrlPath("/a/../../etc/passwd")).toThrow(BadRequestError);
    expect(() => normalizeUrlPath("/..%2fetc")).toThrow("Path escapes the document root");
  });

  test("refuses NUL bytes", () => {
    expect(() => normalizeUrlPath("/a%00.html")).toThrow("Path contains a NUL byte");
  });

  test("refuses malformed escapes", () => {
    expect(() => normalizeUrlPath("/%E0%A4%A")).toThrow(BadRequestError);
  });
});

describe("resolveResource", () => {
  let root: string;

  beforeAll(() => {
    root = makeDocRoot({
      "index.html": "root index",
      "about.html": "about",
      "legacy/index.htm": "legacy",
      "empty/.keep": "",
    });
  });

  afterAll(() => {
    removeDocRoot(root);
  });

  test("file path", async () => {
    const resource = await resolveResource(root, "/about.html", INDEX);
    expect(resource.filePath).toBe(join(root, "about.html"));
    expect(resource.urlPath).toBe("/about.html");
    expect(resource.stats.size).toBe(5);
  });

  test("root resolves to its index", async () => {
    const resource = await resolveResource(root, "/", INDEX);
    expect(resource.filePath).toBe(join(root, "index.html"));
    expect(resource.urlPath).toBe("/");
  });

  test("directory resolves to the second index name", async () => {
    const resource = await resolveResource(root, "/legacy", INDEX);
    expect(resource.filePath).toBe(join(root, "legacy", "index.htm"));
    expect(resource.urlPath).toBe("/legacy/");
  });

  test("missing file", async () => {
    await expect(resolveResource(root, "/nope.html", INDEX)).rejects.toThrow(NotFoundError);
  });

  test("missing parent directory", async () => {
    await expect(resolveResource(root, "/about.html/child", INDEX)).rejects.toThrow(NotFoundError);
  });

  test("directory without index", async () => {
    await expect(resolveResource(root, "/empty/", INDEX)).rejects.toMatchObject({
      statusCode: 404,
      urlPath: "/empty/",
    });
  });
});
