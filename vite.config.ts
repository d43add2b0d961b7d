import react from "@vitejs/plugin-react";
import { defineConfig } from "vite";

// Renderer bundle. The desktop shell loads dist/renderer/index.html and
// injects `window.toolbar` from its preload script.
export default defineConfig({
  root: "src/renderer",
  base: "./",
  plugins: [react()],
  build: {
    outDir: "../../dist/renderer",
    emptyOutDir: true,
  },
});
