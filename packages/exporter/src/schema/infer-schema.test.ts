import { describe, it, expect } from "vitest";
import { Types } from "mongoose";
import { fieldType, flattenSchema, inferSchema, mergeSchemas } from "./infer-schema.js";

describe("fieldType", () => {
  it("describes leaves, arrays and nested documents", () => {
    expect(
      fieldType({
        _id: new Types.ObjectId(),
        text: "hello",
        tokenCount: 12,
        isCreatedByUser: true,
        createdAt: new Date(0),
        files: ["a.png"],
        plugins: [],
        error: null,
        meta: { endpoint: "openAI" },
      }),
    ).toEqual({
      _id: "ObjectId",
      text: "string",
      tokenCount: "number",
      isCreatedByUser: "boolean",
      createdAt: "datetime",
      files: ["string"],
      plugins: [],
      error: "null",
      meta: { endpoint: "string" },
    });
  });
});

describe("mergeSchemas", () => {
  it("keeps a type both sides agree on", () => {
    expect(mergeSchemas("string", "string")).toBe("string");
  });

  it("lists conflicting scalar types", () => {
    expect(mergeSchemas("string", "null")).toEqual(["string", "null"]);
  });

  it("takes the present side when one is missing", () => {
    expect(mergeSchemas(undefined, { a: "number" })).toEqual({ a: "number" });
    expect(mergeSchemas("boolean", undefined)).toBe("boolean");
  });

  it("merges documents field by field", () => {
    expect(mergeSchemas({ a: "number", b: "string" }, { a: "number", c: "boolean" })).toEqual({
      a: "number",
      b: "string",
      c: "boolean",
    });
  });

  it("prefers the non-empty side of two arrays", () => {
    expect(mergeSchemas([], ["string"])).toEqual(["string"]);
    expect(mergeSchemas(["number"], [])).toEqual(["number"]);
  });
});

describe("flattenSchema", () => {
  it("flattens, de-duplicates and sorts nested lists", () => {
    expect(flattenSchema([["string", "number"], "string"])).toEqual(["number", "string"]);
  });

  it("collapses a single-entry list to its entry", () => {
    expect(flattenSchema({ tags: ["string"] })).toEqual({ tags: "string" });
  });
});

describe("inferSchema", () => {
  it("merges a sample of documents", () => {
    expect(inferSchema([{ a: 1 }, { a: "x" }, { b: true }])).toEqual({
      a: ["number", "string"],
      b: "boolean",
    });
  });

  it("records a field that is sometimes a document and sometimes null", () => {
    expect(inferSchema([{ meta: { k: 1 } }, { meta: null }])).toEqual({
      meta: ["null", { k: "number" }],
    });
  });

  it("describes an empty sample as an empty document", () => {
    expect(inferSchema([])).toEqual({});
  });
});
