import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// A zone east of UTC, where spreadsheet date conversions drift before midnight
process.env.TZ = "Asia/Kolkata";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
  },
});
