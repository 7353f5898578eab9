import { defineConfig, type Options } from "tsup";

export default defineConfig((options: Options) => ({
  entry: ["src/cli.ts"],
  format: ["cjs"],
  target: "node20",
  // @tally/utils is internal and never published, so it is bundled in
  noExternal: ["@tally/utils"],
  clean: true,
  minify: true,
  ...options,
}));
