import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { print, printDetails, printTable } from "../output";

describe("output", () => {
	let mockStdout: string[];

	beforeEach(() => {
		mockStdout = [];
		vi.spyOn(process.stdout, "write").mockImplementation((data) => {
			mockStdout.push(String(data));
			return true;
		});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("prints a message to stdout", () => {
		print("hello world");
		expect(mockStdout).toEqual(["hello world\n"]);
	});

	it("prints an aligned table with headers and rows", () => {
		printTable([
			{ id: 1, key: "redshift", port: "5439" },
			{ id: 2, key: "sftp", port: undefined },
		]);

		expect(mockStdout).toEqual([
			"id  key       port\n",
			"--  --------  ----\n",
			"1   redshift  5439\n",
			"2   sftp\n",
		]);
	});

	it("prints (none) for empty table", () => {
		printTable([]);
		expect(mockStdout).toEqual(["(none)\n"]);
	});

	it("prints details aligned and skips empty values", () => {
		printDetails([
			["Name", "SFTP Server"],
			["Driver", undefined],
			["Port", "22"],
		]);

		expect(mockStdout).toEqual(["  Name: SFTP Server\n", "  Port: 22\n"]);
	});
});
