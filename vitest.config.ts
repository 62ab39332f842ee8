import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: { LOG_LEVEL: "error", DISCORD_BOT_TOKEN: "", DISCORD_CHANNEL_ID: "" },
  },
});
