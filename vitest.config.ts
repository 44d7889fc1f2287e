import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const local = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@rowforms/contracts": local("./packages/contracts/index.ts"),
      "@rowforms/engine": local("./packages/engine/src/index.ts"),
      "@rowforms/adapters": local("./packages/adapters/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
  },
});
