import { defineConfig } from "vite";

export default defineConfig({
  // Relative asset paths so the built page works from any sub-path
  base: "./",
  server: {
    open: true,          // Auto-open browser on `vite dev`
    port: 5199,          // Fixed dev server port
    strictPort: true,    // Fail if the port is taken instead of silently picking another
  },
});
