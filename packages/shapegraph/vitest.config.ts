import { fileURLToPath } from "node:url";

import { configDefaults, defineConfig } from "vitest/config";

const resolve = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "shapegraph/interchange": resolve("./src/interchange/index.ts"),
      "shapegraph/postgres": resolve("./src/gateway/postgres/index.ts"),
      "shapegraph/sqlite": resolve("./src/gateway/sqlite/index.ts"),
      shapegraph: resolve("./src/index.ts"),
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
    exclude: [
      ...configDefaults.exclude,
      "**/dist/**",
      "**/.{idea,git,cache,output,temp}/**",
    ],
    globals: false,
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.d.ts", "src/gateway/drizzle/ddl.ts"],
    },
  },
});
