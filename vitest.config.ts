import { defineConfig } from "vitest/config";
import fs from "fs";
import path from "path";

// Mirrors vite.config.ts: every top-level directory in src is importable by name
const src_aliases = Object.fromEntries(
  fs
    .readdirSync(path.resolve(__dirname, "src"), { withFileTypes: true })
    .filter((dirent) => dirent.isDirectory() && !dirent.name.startsWith("__"))
    .map((dirent) => [dirent.name, path.resolve(__dirname, `./src/${dirent.name}`)]),
);

export default defineConfig({
  define: {
    __DEV__: true,
  },
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    alias: src_aliases,
  },
});
