import { describe, it, expect } from "vitest";
import { normalizeResponse } from "./normalize";

describe("normalizeResponse", () => {
  it("parses a JSON object", () => {
    expect(normalizeResponse('{"company_name":"Acme","main_twitter_handle":"@acme"}')).toEqual({
      company_name: "Acme",
      main_twitter_handle: "@acme",
    });
  });

  it("returns plain text unchanged", () => {
    expect(normalizeResponse("No handle found")).toBe("No handle found");
  });

  it("does not strip markdown fences", () => {
    const fenced = '```json\n{"a":1}\n```';
    expect(normalizeResponse(fenced)).toBe(fenced);
  });

  it("parses JSON scalars and arrays", () => {
    expect(normalizeResponse("42")).toBe(42);
    expect(normalizeResponse('"quoted"')).toBe("quoted");
    expect(normalizeResponse("[1,2]")).toEqual([1, 2]);
  });

  it("keeps an empty string as text", () => {
    expect(normalizeResponse("")).toBe("");
  });

  it("gives the same value when its own output is serialized and parsed again", () => {
    for (const raw of ['{"a":{"b":[1,null]},"c":"x"}', '[1,"two",false,{"d":null}]', "3.5"]) {
      const once = normalizeResponse(raw);
      expect(normalizeResponse(JSON.stringify(once))).toEqual(once);
    }
  });
});
