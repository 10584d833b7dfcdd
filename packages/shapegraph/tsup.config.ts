import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    "interchange/index": "src/interchange/index.ts",
    "sqlite/index": "src/gateway/sqlite/index.ts",
    "postgres/index": "src/gateway/postgres/index.ts",
  },
  format: ["esm", "cjs"],
  dts: true,
  splitting: true,
  sourcemap: true,
  clean: true,
  treeshake: true,
  external: ["better-sqlite3", "pg"],
});
