import { fileURLToPath, URL } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "~/shared": fileURLToPath(new URL("./src/shared", import.meta.url)),
      "~/physics": fileURLToPath(new URL("./src/physics", import.meta.url)),
      "~/workers": fileURLToPath(new URL("./src/workers", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
