import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

// dev server proxies the API to the backend (PORT, default 3001)
export default defineConfig({
  plugins: [react()],
  server: {
    proxy: {
      "/api": `http://localhost:${process.env.PORT ?? 3001}`,
    },
  },
  build: {
    outDir: "dist",
  },
});
