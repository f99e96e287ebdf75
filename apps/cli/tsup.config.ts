import { defineConfig } from 'tsup';

export default defineConfig({
	entry: ['src/index.ts'],
	format: ['esm'],
	dts: false,
	clean: true,
	sourcemap: true,
	target: 'node20',
	splitting: false,
	// Workspace packages ship TypeScript sources, so they are bundled in
	noExternal: [/@upid\/.*/],
	// pino loads its transports in worker threads
	external: ['pino', 'pino-pretty'],
});
