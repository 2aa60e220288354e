import { defineConfig } from 'tsup';

export default defineConfig({
	entry: ['src/index.ts'],
	format: ['esm'],
	dts: false,
	clean: true,
	sourcemap: true,
	target: 'node20',
	noExternal: [/@ulidkit\/.*/],
	// Worker-thread transports can't be bundled by esbuild
	external: ['pino', 'pino-pretty'],
});
