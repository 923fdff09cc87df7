import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    server: {
      deps: {
        inline: ["clipanion"],
      },
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        "src/index.ts",
        "src/cli/program.ts",
        "src/cli/commands/serve.ts",
        "src/cli/commands/chat.ts",
        "src/stack/lifecycle.ts",
        "src/config/types.ts",
        "src/utils/types.ts",
      ],
      thresholds: {
        statements: 70,
        branches: 70,
        functions: 70,
        lines: 70,
      },
    },
  },
});
