import { NumericLiteral, injectNulls } from "@nullmask/core";
import { describe, expect, test } from "vitest";
import { DatasetReadError } from "../src/errors.js";
import { parseJson, parseJsonLines, stringifyJson, stringifyJsonLines } from "../src/json.js";

describe("parseJson", () => {
  test("builds the schema from keys in first-seen order", () => {
    const dataset = parseJson('[{"id":1,"email":"a@example.test"},{"id":2,"phone":"555"}]');

    expect(dataset.columns).toEqual(["id", "email", "phone"]);
    expect(dataset.rows).toEqual([
      { id: 1, email: "a@example.test", phone: null },
      { id: 2, email: null, phone: "555" },
    ]);
  });

  test("accepts a single object", () => {
    expect(parseJson('{"a":true}')).toEqual({ columns: ["a"], rows: [{ a: true }] });
  });

  test("keeps nested values as opaque values", () => {
    const dataset = parseJson('[{"address":{"city":"Lyon"},"tags":["a","b"]}]');

    expect(dataset.rows[0]).toEqual({ address: { city: "Lyon" }, tags: ["a", "b"] });
  });

  test("rejects records that are not objects", () => {
    expect(() => parseJson('[{"a":1}, 2]')).toThrow(new DatasetReadError("Record 2 is not an object", "json"));
  });

  test("rejects scalars", () => {
    expect(() => parseJson("42")).toThrow("JSON must be an object or array of objects");
  });

  test("wraps syntax errors", () => {
    expect(() => parseJson("[{")).toThrow(DatasetReadError);
  });
});

describe("number text", () => {
  test("keeps numbers a float would alter as their source text", () => {
    const dataset = parseJson('[{"id":12345678901234567890,"price":1.50,"qty":3,"rate":-0.25}]');

    expect(dataset.rows[0]).toEqual({
      id: new NumericLiteral("12345678901234567890"),
      price: new NumericLiteral("1.50"),
      qty: 3,
      rate: -0.25,
    });
  });

  test("writes unselected numbers back exactly as read", () => {
    const text = '[{"id":12345678901234567890,"price":1.50,"email":"a@x"}]';

    const { dataset } = injectNulls(parseJson(text), { probability: 1, columns: ["email"] });

    expect(stringifyJson(dataset)).toBe(
      '[\n  {\n    "id": 12345678901234567890,\n    "price": 1.50,\n    "email": null\n  }\n]\n'
    );
  });

  test("JSON Lines keeps number text too", () => {
    const text = '{"id":12345678901234567890,"price":1.50,"email":"a@x"}\n';

    const { dataset } = injectNulls(parseJsonLines(text), { probability: 1, columns: ["email"] });

    expect(stringifyJsonLines(dataset)).toBe('{"id":12345678901234567890,"price":1.50,"email":null}\n');
  });
});

describe("parseJsonLines", () => {
  test("reads one object per line and skips blank lines", () => {
    const dataset = parseJsonLines('{"a":1}\n\n{"a":2,"b":"x"}\r\n');

    expect(dataset.columns).toEqual(["a", "b"]);
    expect(dataset.rows).toEqual([
      { a: 1, b: null },
      { a: 2, b: "x" },
    ]);
  });

  test("names the line that fails to parse", () => {
    expect(() => parseJsonLines('{"a":1}\nnot json\n')).toThrow(/^JSON parsing failed on line 2: /);
  });
});

describe("stringifyJson", () => {
  const dataset = { columns: ["b", "a"], rows: [{ a: 1, b: null }] };

  test("writes records with keys in schema order", () => {
    expect(stringifyJson(dataset)).toBe('[\n  {\n    "b": null,\n    "a": 1\n  }\n]\n');
  });

  test("writes JSON Lines", () => {
    expect(stringifyJsonLines(dataset)).toBe('{"b":null,"a":1}\n');
  });

  test("writes bigints as bare digits", () => {
    expect(stringifyJsonLines({ columns: ["n"], rows: [{ n: 9007199254740993n }] })).toBe('{"n":9007199254740993}\n');
  });

  test("round-trips through the parser", () => {
    const original = { columns: ["id", "note"], rows: [{ id: 1, note: null }, { id: 2, note: "x" }] };

    expect(parseJson(stringifyJson(original))).toEqual(original);
    expect(parseJsonLines(stringifyJsonLines(original))).toEqual(original);
  });
});
