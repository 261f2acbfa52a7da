import js from '@eslint/js'
import globals from 'globals'
import tseslint from 'typescript-eslint'
import tsdoc from 'eslint-plugin-tsdoc'

export default tseslint.config(
	{
		ignores: ['dist/**'],
	},
	js.configs.recommended,
	...tseslint.configs.recommended,
	{
		files: ['**/*.{js,mjs,cjs,ts,mts,cts}'],
		languageOptions: { globals: globals.node },
		plugins: { tsdoc },
		rules: {
			'tsdoc/syntax': 'error',
		},
	}
)
