import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const serverSrc = fileURLToPath(new URL("./server/src/", import.meta.url));
const sharedLogging = fileURLToPath(new URL("./shared/logging/index.ts", import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      // Mirrors the "#*" subpath imports of the server package
      { find: /^#(.*)\.js$/, replacement: `${serverSrc}$1.ts` },
      { find: "@nudge/shared/logging", replacement: sharedLogging },
    ],
  },
  test: {
    include: ["shared/**/*.test.ts", "server/src/**/*.test.ts"],
    environment: "node",
  },
});
