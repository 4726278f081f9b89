// eslint.config.mts
// @ts-check
import eslint from "@eslint/js";
import { defineConfig } from "eslint/config";
import tseslint from "typescript-eslint";
import vitest from "eslint-plugin-vitest";
import globals from "globals";

export default defineConfig(
	eslint.configs.recommended,
	tseslint.configs.strictTypeChecked,
	{
		languageOptions: {
			parser: tseslint.parser,
			globals: { ...globals.node },
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		files: ["**/*.ts"],
		rules: {
			complexity: ["error", 8],
			"max-lines-per-function": [
				"error",
				{ max: 50, skipBlankLines: true, skipComments: true },
			],
			"max-params": ["error", 5],
			"max-depth": ["error", 4],
			"max-lines": [
				"error",
				{ max: 300, skipBlankLines: true, skipComments: true },
			],
			"@typescript-eslint/restrict-template-expressions": [
				"error",
				{
					allowNumber: true,
					allowBoolean: true,
					allowNullish: false,
					allowAny: false,
					allowRegExp: false,
				},
			],
			"@typescript-eslint/ban-ts-comment": [
				"error",
				{
					"ts-ignore": true,
					"ts-nocheck": true,
					"ts-expect-error": true,
					"ts-check": true,
				},
			],
			"no-restricted-syntax": [
				"error",
				{
					selector: "TSUnknownKeyword",
					message: "Do not use 'unknown'. Narrow the type at its source.",
				},
				{
					selector: "SwitchStatement",
					message: [
						"Switch statements are forbidden.",
						"How to fix: Use ts-pattern match() instead.",
					].join("\n"),
				},
				{
					selector: 'CallExpression[callee.name="require"]',
					message: "Avoid using require(). Use ES6 imports instead.",
				},
				{
					selector: "ThrowStatement > Literal:not([value=/^\\w+Error:/])",
					message:
						'Do not throw string literals or non-Error objects. Throw new Error("...") instead.',
				},
				{
					selector:
						"FunctionDeclaration[async=true], FunctionExpression[async=true], ArrowFunctionExpression[async=true]",
					message: "async/await is forbidden. Use Effect.gen / Effect.tryPromise.",
				},
				{
					selector: "NewExpression[callee.name='Promise']",
					message: "Use Effect.async / Effect.tryPromise instead of new Promise.",
				},
				{
					selector: "CallExpression[callee.object.name='Promise']",
					message: "Promise.* is forbidden. Use Effect combinators (all, forEach, etc.).",
				},
			],
			"@typescript-eslint/no-restricted-types": [
				"error",
				{
					types: {
						unknown: {
							message: "Do not use 'unknown'. Narrow the type at its source.",
						},
						Promise: {
							message: "Use Effect.Effect<A, E, R> instead of Promise.",
							suggest: ["Effect.Effect"],
						},
						"Promise<*>": {
							message: "Use Effect.Effect<T, E, R> instead of Promise<T>.",
							suggest: ["Effect.Effect<T, E, R>"],
						},
					},
				},
			],
			"@typescript-eslint/use-unknown-in-catch-callback-variable": "off",
			"no-throw-literal": "off",
			"@typescript-eslint/only-throw-error": [
				"error",
				{ allowThrowingUnknown: false, allowThrowingAny: false },
			],
		},
	},
	{
		// BIN is the process boundary: it awaits the program once and exits
		files: ["src/bin/**/*.ts"],
		rules: {
			"no-restricted-syntax": "off",
			"@typescript-eslint/no-restricted-types": "off",
		},
	},
	{
		files: ["**/*.{test,spec}.ts"],
		...vitest.configs.recommended,
		rules: {
			...vitest.configs.recommended.rules,
			"max-lines-per-function": "off",
		},
	},
	{
		files: ["**/*.{js,cjs,mjs,mts}"],
		extends: [tseslint.configs.disableTypeChecked],
	},
	{ ignores: ["dist/**", "coverage/**"] },
);
