import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["layerctl/test/**/*.test.ts"],
    environment: "node",
  },
});
