import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "src/**/*.test.tsx"],
    setupFiles: ["./vitest.setup.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
      reportsDirectory: "./out/coverage",
      include: [
        "src/main/actions/*.ts",
        "src/main/providers/*.ts",
        "src/main/workspaces/*.ts",
        "src/main/settings-store.ts",
        "src/renderer/src/toolbar-groups.ts",
        "src/renderer/src/components/*.tsx",
      ],
      thresholds: {
        lines: 60,
        functions: 60,
        branches: 50,
        statements: 60,
      },
    },
  },
});
