// /vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/services/*/test/**/*.spec.ts"],
    setupFiles: ["backend/services/shared/test/setup.ts"],
    restoreMocks: true,
    watch: false,
    reporters: ["default"],
  },
});
