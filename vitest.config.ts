import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["web/**/*.test.ts"],
    coverage: { provider: "v8", reporter: ["text", "html"] },
  },
});
