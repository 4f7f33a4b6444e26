import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/bin.ts"],
  format: ["esm"],
  sourcemap: true,
  clean: true,
  treeshake: true,
  target: "node20",
  noExternal: [/^@zone-locks\//],
});
