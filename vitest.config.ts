import { defineConfig } from "vitest/config";

const sharedEntry = new URL("./shared/src/index.ts", import.meta.url).pathname;

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: "shared",
          root: "./shared",
          include: ["src/**/*.test.ts"],
        },
      },
      {
        resolve: {
          alias: {
            "@coinwire/shared": sharedEntry,
          },
        },
        test: {
          name: "service",
          root: "./service",
          include: ["src/**/*.test.ts"],
        },
      },
    ],
  },
});
