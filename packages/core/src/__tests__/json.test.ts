import { describe, expect, it } from "vitest";
import { isJsonObject, isJsonValue, parseJsonColumn } from "../json";

describe("isJsonValue", () => {
	it("accepts scalars and null", () => {
		expect(isJsonValue("text")).toBe(true);
		expect(isJsonValue(0)).toBe(true);
		expect(isJsonValue(false)).toBe(true);
		expect(isJsonValue(null)).toBe(true);
	});

	it("accepts nested arrays and objects", () => {
		expect(
			isJsonValue({
				help_text: "SSL encryption setting",
				options: [{ value: "require", label: "Require" }],
				min: 1024,
			}),
		).toBe(true);
	});

	it("rejects values JSON cannot carry", () => {
		expect(isJsonValue(undefined)).toBe(false);
		expect(isJsonValue(Number.NaN)).toBe(false);
		expect(isJsonValue(Number.POSITIVE_INFINITY)).toBe(false);
		expect(isJsonValue(10n)).toBe(false);
		expect(isJsonValue(() => 1)).toBe(false);
		expect(isJsonValue(new Date())).toBe(false);
		expect(isJsonValue({ nested: { when: new Map() } })).toBe(false);
		expect(isJsonValue([1, undefined])).toBe(false);
	});

	it("rejects cyclic structures", () => {
		const cyclic: Record<string, unknown> = { a: 1 };
		cyclic.self = cyclic;
		expect(isJsonValue(cyclic)).toBe(false);
	});

	it("accepts the same object referenced twice without a cycle", () => {
		const shared = { value: "csv" };
		expect(isJsonValue({ a: shared, b: shared })).toBe(true);
	});

	it("accepts objects without a prototype", () => {
		const bare = Object.create(null) as Record<string, unknown>;
		bare.placeholder = "dev";
		expect(isJsonValue(bare)).toBe(true);
	});
});

describe("isJsonObject", () => {
	it("accepts only objects", () => {
		expect(isJsonObject({ file_extensions: ["txt", "csv"] })).toBe(true);
		expect(isJsonObject({})).toBe(true);
		expect(isJsonObject(["txt"])).toBe(false);
		expect(isJsonObject(null)).toBe(false);
		expect(isJsonObject("{}")).toBe(false);
	});
});

describe("parseJsonColumn", () => {
	it("returns undefined for empty columns", () => {
		expect(parseJsonColumn(null)).toBeUndefined();
		expect(parseJsonColumn(undefined)).toBeUndefined();
	});

	it("parses JSON text", () => {
		expect(parseJsonColumn('{"min":1,"max":65535}')).toEqual({ min: 1, max: 65535 });
	});

	it("passes through already-parsed documents", () => {
		const doc = { placeholder: "sftp.example.com" };
		expect(parseJsonColumn(doc)).toBe(doc);
	});

	it("throws on malformed text", () => {
		expect(() => parseJsonColumn("{not json")).toThrow(SyntaxError);
	});

	it("throws on values that are not JSON", () => {
		expect(() => parseJsonColumn(new Date())).toThrow(TypeError);
	});
});
