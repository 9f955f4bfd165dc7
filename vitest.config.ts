import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      {
        extends: "./vitest.shared.ts",
        test: {
          name: "price-stats",
          include: ["packages/**/src/**/*.test.ts"],
        },
      },
      {
        extends: "./vitest.shared.ts",
        test: {
          name: "crypto-api",
          include: ["services/**/src/**/*.test.ts"],
        },
      },
    ],
  },
});
