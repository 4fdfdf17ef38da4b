import type { UserConfig } from "tsdown";

export default {
	entry: "src/index.ts",
	dts: true,
	platform: "node",
	target: "node20",
	format: ["esm", "cjs"],
	minify: false,
	sourcemap: true,
} satisfies UserConfig;
