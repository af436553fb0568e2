// Command line tool to emit type declarations and bundle the library into dist/.

import { resolve, dirname, basename } from 'path';
import { mkdirSync, writeFileSync } from 'fs';
import { builtinModules } from 'module';

import { createCompilerHost, createProgram, flattenDiagnosticMessageText } from 'typescript';
import { rollup } from 'rollup';
import { minify } from 'terser';

import { typescript, compilerOptions, root } from './rollup-typescript';

const entry = resolve(root, 'src/index.ts');
const dist = resolve(root, 'dist');

function write(key: string, text: string) {
	mkdirSync(dirname(key), { recursive: true });
	writeFileSync(key, text, 'utf-8');
	console.log('Wrote ' + key.substring(root.length + 1));
}

/** Emit .d.ts files for the entry point and all its recursive imports. */

function emitDeclarations(key: string) {
	const options = Object.assign({}, compilerOptions, {
		declaration: true,
		emitDeclarationOnly: true,
		sourceMap: false,
		rootDir: resolve(root, 'src'),
		outDir: dist
	});

	const host = createCompilerHost(options);
	const program = createProgram([key], options, host);
	const result = program.emit(void 0, (key, text) => write(key, text));

	if(result.emitSkipped) {
		const messages = result.diagnostics.map((diagnostic) => flattenDiagnosticMessageText(diagnostic.messageText, '\n'));
		throw new Error('Declaration emit failed:\n' + messages.join('\n'));
	}
}

async function main() {
	emitDeclarations(entry);

	const bundle = await rollup({
		external: builtinModules,
		plugins: [typescript()],
		input: entry
	});

	try {
		await bundle.write({
			file: resolve(dist, 'index.js'),
			format: 'es',
			sourcemap: true
		});
		console.log('Wrote dist/index.js');

		const built = await bundle.generate({
			sourcemap: true,
			format: 'iife',
			name: 'outcodeClip'
		});

		const out = built.output[0];
		// Write intermediate source map inline so Terser finds it.
		const code = out.code + (out.map ? '\n//# sourceMappingURL=' + out.map.toUrl() + '\n' : '');
		const minKey = resolve(dist, 'index.min.js');
		const mapKey = basename(minKey + '.map');

		const tersed = await minify(code, {
			sourceMap: {
				content: 'inline',
				url: mapKey
			},
			compress: {
				passes: 2,
				pure_getters: true,
				unsafe_comps: true
			},
			format: {
				max_line_len: 200
			}
		});

		if(tersed.code === void 0 || tersed.map === void 0) throw new Error('Terser produced no output.');

		write(minKey, tersed.code);
		write(resolve(dist, mapKey), typeof tersed.map == 'string' ? tersed.map : JSON.stringify(tersed.map));
	} finally {
		await bundle.close();
	}
}

main().catch((err: unknown) => {
	console.error(err);
	process.exitCode = 1;
});
