import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text"],
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts", "src/llm/openai_agents_provider.ts"],
      thresholds: {
        lines: 90,
        functions: 90,
        statements: 90,
        // Scheduler and client code carry abort/timeout branches that only real I/O reaches.
        branches: 80
      }
    }
  }
});
