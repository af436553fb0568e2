import { resolve, dirname, normalize } from 'path';
import { fileURLToPath } from 'url';

import type { Plugin } from 'rollup';
import type { CompilerOptions } from 'typescript';
import {
	ModuleKind,
	ModuleResolutionKind,
	ScriptTarget,

	sys,
	readConfigFile,
	parseJsonConfigFileContent,
	formatDiagnostic,
	transpileModule,
	nodeModuleNameResolver
} from 'typescript';

export const root = resolve(dirname(fileURLToPath(import.meta.url)), '..');

const diagnosticHost = {
	getCanonicalFileName: (key: string) => key,
	getCurrentDirectory: () => root,
	getNewLine: () => '\n'
};

/** Read compiler options from the project tsconfig.json. */

function readCompilerOptions(): CompilerOptions {
	const configKey = resolve(root, 'tsconfig.json');
	const { config, error } = readConfigFile(configKey, sys.readFile);

	if(error) throw new Error(formatDiagnostic(error, diagnosticHost));

	return parseJsonConfigFileContent(config, sys, root, void 0, configKey).options;
}

export const compilerOptions: CompilerOptions = Object.assign({}, readCompilerOptions(), {
	// The project config only type-checks.
	noEmit: false,
	sourceMap: true,

	// Skip .d.ts files when bundling.
	noDtsResolution: true,

	// Don't check types in EcmaScript API declarations.
	skipDefaultLibCheck: true,
	// Don't check types in declarations.
	skipLibCheck: true,

	module: ModuleKind.ES2020,
	moduleResolution: ModuleResolutionKind.Bundler,
	target: ScriptTarget.ES2020
});

/** Rollup plugin to transpile TypeScript and use its module resolution logic. */

export const typescript = (): Plugin => ({
	name: 'typescript',

	transform: (code: string, id: string) => {
		if(!/\.ts$/.test(id)) return null;

		const out = transpileModule(code, { compilerOptions, fileName: id });

		return {
			code: out.outputText,
			map: out.sourceMapText
		};
	},

	resolveId(key: string, base?: string) {
		if(!base) return resolve(root, key);

		const resolved = nodeModuleNameResolver(key, base, compilerOptions, sys).resolvedModule;

		return resolved ? normalize(resolved.resolvedFileName) : null;
	}
});
