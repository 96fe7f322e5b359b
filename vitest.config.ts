import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packages = fileURLToPath(new URL("./packages", import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@sourcedeck/core": `${packages}/core/src/index.ts`,
			"@sourcedeck/catalog": `${packages}/catalog/src/index.ts`,
		},
	},
	test: {
		globals: true,
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
	},
});
