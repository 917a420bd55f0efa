import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    env: { NODE_ENV: "test" },
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      reportsDirectory: "coverage",
      exclude: [
        "**/*.test.ts",
        "**/*.d.ts",
        // Process wiring, exercised only by a running service
        "src/index.ts",
        "src/fleet/services.ts",
      ],
    },
  },
});
