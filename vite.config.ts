import { defineConfig } from "vite";
import { fileURLToPath } from "node:url";

const src = (path: string) => fileURLToPath(new URL(`./src/${path}`, import.meta.url));

export default defineConfig({
  build: {
    outDir: "dist",
    emptyOutDir: true,
    target: "node20",
    lib: {
      entry: {
        index: src("engine/index.ts"),
        bin: src("bin.ts"),
      },
      formats: ["es"],
    },
    rollupOptions: {
      external: [/^node:/],
      output: {
        banner: (chunk) => (chunk.name === "bin" ? "#!/usr/bin/env node" : ""),
      },
    },
  },
});
