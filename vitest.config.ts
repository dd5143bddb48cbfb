import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@taskgraph/shared": fileURLToPath(new URL("./shared/src/index.ts", import.meta.url)),
      "@taskgraph/worker": fileURLToPath(new URL("./worker/src/index.ts", import.meta.url))
    }
  },
  test: {
    environment: "node",
    include: ["shared/tests/**/*.test.ts", "worker/tests/**/*.test.ts", "control-plane/tests/**/*.test.ts"]
  }
});
