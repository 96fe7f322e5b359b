import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createCliLogger } from "../logger";

describe("createCliLogger", () => {
	let mockStdout: string[];
	let mockStderr: string[];

	beforeEach(() => {
		mockStdout = [];
		mockStderr = [];
		vi.spyOn(process.stdout, "write").mockImplementation((data) => {
			mockStdout.push(String(data));
			return true;
		});
		vi.spyOn(process.stderr, "write").mockImplementation((data) => {
			mockStderr.push(String(data));
			return true;
		});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("writes JSON lines to stderr only", () => {
		createCliLogger({}).info("seeded", { key: "sftp" });

		expect(mockStdout).toEqual([]);
		expect(mockStderr).toHaveLength(1);
		expect(JSON.parse(mockStderr[0] ?? "")).toMatchObject({
			level: "info",
			msg: "seeded",
			service: "sourcedeck-cli",
			key: "sftp",
		});
	});

	it("honours SOURCEDECK_LOG_LEVEL", () => {
		const logger = createCliLogger({ SOURCEDECK_LOG_LEVEL: "warn" });
		logger.info("hidden");
		logger.warn("shown");

		expect(mockStderr.map((line) => JSON.parse(line).msg)).toEqual(["shown"]);
	});

	it("defaults to info for an unknown level", () => {
		const logger = createCliLogger({ SOURCEDECK_LOG_LEVEL: "verbose" });
		logger.debug("hidden");
		logger.info("shown");

		expect(mockStderr.map((line) => JSON.parse(line).msg)).toEqual(["shown"]);
	});
});
