import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  // VITE_API_URL lives in the repository-level .env next to the API settings
  envDir: '..',
  server: {
    port: 5173,
  },
});
