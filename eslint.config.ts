import js from '@eslint/js';
import stylistic from '@stylistic/eslint-plugin';
import { defineConfig } from 'eslint/config';
import promisePlugin from 'eslint-plugin-promise';
import tseslint from 'typescript-eslint';

export default defineConfig([
  { ignores: ['dist/'] },
  js.configs.recommended,
  tseslint.configs.recommendedTypeChecked,
  {
    languageOptions: {
      parserOptions: {
        projectService: true,
        tsconfigRootDir: import.meta.dirname,
      },
    },
  },
  stylistic.configs.customize({
    semi: true,
    braceStyle: 'stroustrup',
  }),
  promisePlugin.configs['flat/recommended'],
  {
    rules: {
      'promise/always-return': ['error', { ignoreLastCallback: true }],
      'promise/no-promise-in-callback': 'error',
      '@typescript-eslint/require-await': 'off',
      '@typescript-eslint/no-unused-vars': ['error', { varsIgnorePattern: '^_' }],
      'no-console': 'error',
    },
  },
  {
    // bin entry point
    files: ['src/cli/cli.ts'],
    rules: { 'no-console': 'off' },
  },
]);
