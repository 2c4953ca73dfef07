import { defineConfig } from "vitest/config";

// Local date-time formatting is asserted against a fixed offset (+06:00).
process.env.TZ = "Asia/Dhaka";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
  },
});
