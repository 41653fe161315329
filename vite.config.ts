import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

// Single self-mounting script: <script src="cost-widget.js" data-api-url="..."></script>
export default defineConfig({
  plugins: [react()],
  define: {
    'process.env.NODE_ENV': JSON.stringify('production'),
  },
  build: {
    outDir: 'dist/widget',
    emptyOutDir: true,
    lib: {
      entry: 'src/widget/embed.tsx',
      name: 'CostWidget',
      formats: ['iife'],
      fileName: () => 'cost-widget.js',
    },
  },
});
