import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  "packages/core",
  "packages/telegram",
  "packages/userbot",
  "packages/gofile",
  {
    test: {
      name: "e2e",
      include: ["test/**/*.test.ts"],
    },
  },
]);
