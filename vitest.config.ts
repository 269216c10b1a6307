import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // The server test binds a loopback socket.
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
});
