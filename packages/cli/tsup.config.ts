import { defineConfig } from "tsup";

export default defineConfig({
	entry: {
		bin: "src/bin.ts",
	},
	format: ["esm"],
	platform: "node",
	target: "node20",
	sourcemap: true,
	clean: true,
	// Workspace packages ship TypeScript sources, so they are bundled in.
	noExternal: [/^@sourcedeck\//],
	external: ["pg", "mysql2"],
});
