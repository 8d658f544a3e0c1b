import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const srcPath = (relative: string) => fileURLToPath(new URL(`./src/${relative}`, import.meta.url));

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node"
  },
  resolve: {
    alias: [
      { find: /^@domain\/(.*)$/, replacement: `${srcPath("core/domain/")}$1` },
      { find: /^@services\/(.*)$/, replacement: `${srcPath("core/services/")}$1` },
      { find: /^@cli\/(.*)$/, replacement: `${srcPath("cli/")}$1` },
      { find: "@core", replacement: srcPath("core/index.ts") }
    ]
  }
});
