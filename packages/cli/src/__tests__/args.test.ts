import { afterEach, describe, expect, it, vi } from "vitest";
import { optionalFlag, parseArgs, requireId } from "../args";

describe("parseArgs", () => {
	it("parses a simple command", () => {
		const result = parseArgs(["node", "sourcedeck", "migrate"]);
		expect(result.command).toEqual(["migrate"]);
		expect(result.flags).toEqual({});
		expect(result.positional).toEqual([]);
	});

	it("parses a two-word command", () => {
		const result = parseArgs(["node", "sourcedeck", "types", "list"]);
		expect(result.command).toEqual(["types", "list"]);
	});

	it("keeps the word after a one-word command positional", () => {
		const result = parseArgs(["node", "sourcedeck", "seed", "catalog.json"]);
		expect(result.command).toEqual(["seed"]);
		expect(result.positional).toEqual(["catalog.json"]);
	});

	it("parses --flag value pairs", () => {
		const result = parseArgs([
			"node",
			"sourcedeck",
			"types",
			"delete",
			"--id",
			"3",
			"--url",
			"memory:",
		]);
		expect(result.command).toEqual(["types", "delete"]);
		expect(result.flags).toEqual({ id: "3", url: "memory:" });
	});

	it("parses --flag=value syntax", () => {
		const result = parseArgs([
			"node",
			"sourcedeck",
			"fields",
			"get",
			"--id=12",
			"--url=postgres://localhost/catalog?sslmode=require",
		]);
		expect(result.flags).toEqual({
			id: "12",
			url: "postgres://localhost/catalog?sslmode=require",
		});
	});

	it("parses boolean flags (no value)", () => {
		const result = parseArgs(["node", "sourcedeck", "migrate", "--reset"]);
		expect(result.command).toEqual(["migrate"]);
		expect(result.flags).toEqual({ reset: "true" });
	});

	it("parses a boolean flag followed by another flag", () => {
		const result = parseArgs(["node", "sourcedeck", "seed", "--strict", "--file", "seeds.json"]);
		expect(result.flags).toEqual({ strict: "true", file: "seeds.json" });
	});

	it("parses positional arguments mixed with flags", () => {
		const result = parseArgs([
			"node",
			"sourcedeck",
			"types",
			"show",
			"--url",
			"memory:",
			"redshift",
		]);
		expect(result.command).toEqual(["types", "show"]);
		expect(result.flags).toEqual({ url: "memory:" });
		expect(result.positional).toEqual(["redshift"]);
	});

	it("handles empty arguments", () => {
		const result = parseArgs(["node", "sourcedeck"]);
		expect(result.command).toEqual([]);
		expect(result.flags).toEqual({});
		expect(result.positional).toEqual([]);
	});

	it("parses -h short flags", () => {
		const result = parseArgs(["node", "sourcedeck", "-h"]);
		expect(result.flags).toEqual({ h: "true" });
	});
});

describe("requireId", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("returns a positive integer", () => {
		expect(requireId({ id: "42" })).toBe(42);
	});

	it("exits on a malformed id", () => {
		const stderr: string[] = [];
		vi.spyOn(process.stderr, "write").mockImplementation((data) => {
			stderr.push(String(data));
			return true;
		});
		vi.spyOn(process, "exit").mockImplementation(() => {
			throw new Error("process.exit");
		});

		expect(() => requireId({ id: "4.5" })).toThrow("process.exit");
		expect(() => requireId({})).toThrow("process.exit");
		expect(stderr).toEqual([
			'Error: --id must be a positive integer (got "4.5")\n',
			"Error: --id is required\n",
		]);
	});
});

describe("optionalFlag", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("returns the value or undefined", () => {
		expect(optionalFlag({ file: "seeds.json" }, "file", "path")).toBe("seeds.json");
		expect(optionalFlag({}, "file", "path")).toBeUndefined();
	});

	it("exits when the flag is given without a value", () => {
		const stderr: string[] = [];
		vi.spyOn(process.stderr, "write").mockImplementation((data) => {
			stderr.push(String(data));
			return true;
		});
		vi.spyOn(process, "exit").mockImplementation(() => {
			throw new Error("process.exit");
		});

		expect(() => optionalFlag({ file: "true" }, "file", "path")).toThrow("process.exit");
		expect(stderr).toEqual(["Error: --file requires a path\n"]);
	});
});
