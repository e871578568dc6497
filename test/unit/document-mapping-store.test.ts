import { beforeEach, describe, expect, it, vi } from "vitest";
import { DocumentMappingStore } from "../../src/modules/documents/document-mapping-store.js";

const mapping = {
  "doc-b": {
    title: "Webflow forms",
    source: "kb/webflow/forms.md",
    topics: ["Webflow", "registration"],
    embedding_info: { chunks: 4 }
  },
  "doc-a": {
    file_name: "airtable.md",
    file_path: "kb/airtable.md",
    topics: ["Airtable", "Webflow", 7],
    chunk_count: 2
  },
  broken: "not an object"
};

describe("modules/documents/document-mapping-store", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("lists documents sorted by id and skips invalid entries", async () => {
    const store = new DocumentMappingStore({
      filePath: "mapping.json",
      cwd: "/srv/app",
      readFile: async () => JSON.stringify(mapping)
    });

    await expect(store.listDocuments()).resolves.toEqual([
      { docId: "doc-a", title: "airtable.md", source: "kb/airtable.md", topics: ["Airtable", "Webflow"], chunkCount: 2 },
      {
        docId: "doc-b",
        title: "Webflow forms",
        source: "kb/webflow/forms.md",
        topics: ["Webflow", "registration"],
        chunkCount: 4
      }
    ]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("lists unique topics in sorted order", async () => {
    const store = new DocumentMappingStore({ filePath: "mapping.json", readFile: async () => JSON.stringify(mapping) });

    await expect(store.listTopics()).resolves.toEqual(["Airtable", "Webflow", "registration"]);
  });

  it("reads the file once until refreshed", async () => {
    const readFile = vi.fn(async () => JSON.stringify(mapping));
    const store = new DocumentMappingStore({ filePath: "/data/mapping.json", readFile });

    await store.listTopics();
    await store.listDocuments();
    expect(readFile).toHaveBeenCalledTimes(1);
    expect(readFile).toHaveBeenCalledWith("/data/mapping.json");

    store.refresh();
    await store.listTopics();
    expect(readFile).toHaveBeenCalledTimes(2);
  });

  it("returns an empty mapping when the file is missing", async () => {
    const missing = Object.assign(new Error("ENOENT: no such file"), { code: "ENOENT" });
    const store = new DocumentMappingStore({ filePath: "missing.json", readFile: async () => Promise.reject(missing) });

    await expect(store.listDocuments()).resolves.toEqual([]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("returns an empty mapping when the file holds invalid JSON", async () => {
    const store = new DocumentMappingStore({ filePath: "bad.json", readFile: async () => "{nope" });

    await expect(store.listTopics()).resolves.toEqual([]);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
