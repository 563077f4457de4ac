import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    // CLI output prints local time
    env: { TZ: "UTC" },
  },
});
