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
	// core ships TypeScript sources, so it is bundled in
	noExternal: ["@viewgen/core"],
});
