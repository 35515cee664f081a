import { defineConfig } from 'vite';

export default defineConfig({
  server: {
    host: true,
    port: 5173,
  },
  preview: {
    port: 4173,
  },
  optimizeDeps: {
    // three/webgpu shares module-level singletons with the three entry point;
    // pre-bundle them together so the renderer and materials see one copy.
    include: ['three', 'three/webgpu'],
  },
  worker: {
    format: 'es',
  },
  build: {
    chunkSizeWarningLimit: 1500,
    rollupOptions: {
      output: {
        manualChunks(id) {
          if (id.includes('node_modules/three/')) {
            return 'three';
          }
          return undefined;
        },
      },
    },
  },
});
