import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const { loadConfig } = vi.hoisted(() => ({ loadConfig: vi.fn() }));

vi.mock("../config", () => ({ loadConfig }));

const { openBackend, resolveDatabaseUrl } = await import("../backend");

describe("resolveDatabaseUrl", () => {
	let mockStderr: string[];

	beforeEach(() => {
		mockStderr = [];
		vi.spyOn(process.stderr, "write").mockImplementation((data) => {
			mockStderr.push(String(data));
			return true;
		});
		vi.spyOn(process, "exit").mockImplementation(() => {
			throw new Error("process.exit");
		});
		vi.stubEnv("SOURCEDECK_DATABASE_URL", "");
		loadConfig.mockReturnValue({ databaseUrl: "mysql://localhost/from-config" });
	});

	afterEach(() => {
		vi.restoreAllMocks();
		vi.unstubAllEnvs();
	});

	it("prefers the --url flag", () => {
		vi.stubEnv("SOURCEDECK_DATABASE_URL", "postgres://localhost/from-env");
		expect(resolveDatabaseUrl({ url: "memory:" })).toBe("memory:");
	});

	it("falls back to the environment", () => {
		vi.stubEnv("SOURCEDECK_DATABASE_URL", "postgres://localhost/from-env");
		expect(resolveDatabaseUrl({})).toBe("postgres://localhost/from-env");
	});

	it("falls back to the config file", () => {
		expect(resolveDatabaseUrl({})).toBe("mysql://localhost/from-config");
	});

	it("exits when no URL is configured", () => {
		loadConfig.mockReturnValue({});

		expect(() => resolveDatabaseUrl({})).toThrow("process.exit");
		expect(mockStderr[0]).toBe(
			"Error: --url is required (or set SOURCEDECK_DATABASE_URL, or run 'sourcedeck use --url <url>')\n",
		);
	});
});

describe("openBackend", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("opens the backend named by the URL", async () => {
		const backend = openBackend({ url: "memory:" });
		expect(backend.dialect).toBe("memory");
		await backend.close();
	});

	it("exits on an unsupported URL", () => {
		const stderr: string[] = [];
		vi.spyOn(process.stderr, "write").mockImplementation((data) => {
			stderr.push(String(data));
			return true;
		});
		vi.spyOn(process, "exit").mockImplementation(() => {
			throw new Error("process.exit");
		});

		expect(() => openBackend({ url: "sqlite://catalog.db" })).toThrow("process.exit");
		expect(stderr).toEqual([
			'Error: Unsupported database URL "sqlite:": expected postgres://, mysql:// or memory:\n',
		]);
	});
});
