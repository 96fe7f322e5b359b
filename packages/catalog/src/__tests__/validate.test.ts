import { describe, expect, it } from "vitest";
import { fieldNotFound } from "../errors";
import {
	checkRowId,
	MAX_ROW_ID,
	validateConfigTypeInput,
	validateFieldInput,
	validateSeed,
} from "../validate";
import { testSeed } from "./test-helpers";

describe("validateConfigTypeInput", () => {
	it("accepts values at the column limits", () => {
		const result = validateConfigTypeInput({
			key: "k".repeat(50),
			displayName: "d".repeat(100),
			color: "c".repeat(20),
			defaultPort: "1".repeat(10),
		});
		expect(result.ok).toBe(true);
	});

	it("counts characters rather than UTF-16 units", () => {
		const result = validateConfigTypeInput({ key: "🔌".repeat(50), displayName: "Plugs" });
		expect(result.ok).toBe(true);
	});

	it("rejects a blank display name", () => {
		const result = validateConfigTypeInput({ key: "x", displayName: "   " });
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe("CONSTRAINT_VIOLATION");
			expect(result.error.message).toBe("config_types.display_name is required");
		}
	});

	it("reports the first failing column", () => {
		const result = validateConfigTypeInput({
			key: "x",
			displayName: "X",
			icon: "i".repeat(101),
			color: "c".repeat(21),
		});
		expect(!result.ok && result.error.message).toBe(
			"config_types.icon exceeds 100 characters (got 101)",
		);
	});

	it("rejects an overlong default port", () => {
		const result = validateConfigTypeInput({ key: "x", displayName: "X", defaultPort: "12345678901" });
		expect(!result.ok && result.error.message).toBe(
			"config_types.default_port exceeds 10 characters (got 11)",
		);
	});
});

describe("validateFieldInput", () => {
	it("rejects an overlong default value", () => {
		const result = validateFieldInput({
			name: "n",
			label: "L",
			fieldType: "text",
			defaultValue: "v".repeat(256),
		});
		expect(!result.ok && result.error.message).toBe(
			"config_fields.default_value exceeds 255 characters (got 256)",
		);
	});

	it("rejects a missing name", () => {
		const result = validateFieldInput({ name: "", label: "L", fieldType: "text" });
		expect(!result.ok && result.error.message).toBe("config_fields.name is required");
	});
});

describe("validateSeed", () => {
	it("accepts a well-formed seed", () => {
		expect(validateSeed(testSeed()).ok).toBe(true);
	});

	it("rejects a field failing its own checks", () => {
		const result = validateSeed(
			testSeed({ fields: [{ name: "n".repeat(101), label: "L", fieldType: "text" }] }),
		);
		expect(!result.ok && result.error.message).toBe(
			"config_fields.name exceeds 100 characters (got 101)",
		);
	});

	it("rejects repeated field names as DUPLICATE_KEY", () => {
		const result = validateSeed(
			testSeed({
				fields: [
					{ name: "port", label: "Port", fieldType: "number" },
					{ name: "port", label: "Port", fieldType: "number" },
				],
			}),
		);
		expect(!result.ok && result.error.code).toBe("DUPLICATE_KEY");
	});
});

describe("checkRowId", () => {
	it("accepts ids from 1 to the INTEGER maximum", () => {
		expect(checkRowId(1, fieldNotFound).ok).toBe(true);
		expect(checkRowId(MAX_ROW_ID, fieldNotFound).ok).toBe(true);
	});

	it.each([0, -4, 1.5, MAX_ROW_ID + 1, Number.NaN])("reports %s as not found", (id) => {
		const result = checkRowId(id, fieldNotFound);
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.code).toBe("NOT_FOUND");
	});
});
