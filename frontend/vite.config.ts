import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

// The dev server forwards API and WebSocket traffic to the back end on :8000.
export default defineConfig({
  plugins: [react()],
  base: "./",
  server: {
    port: 5173,
    proxy: {
      "/api": "http://localhost:8000",
      "/ws": { target: "ws://localhost:8000", ws: true },
    },
  },
});
