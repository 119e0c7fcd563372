import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

/**
 * ワークスペースパッケージはビルドせずにソースを直接読み込む
 * （tsconfig.json の customConditions "@ptpconf/source" と同じ対応）
 */
function sourceOf(pkg: string, entry: string): string {
  return fileURLToPath(new URL(`./packages/${pkg}/src/${entry}.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@ptpconf\/types$/, replacement: sourceOf('types', 'index') },
      { find: /^@ptpconf\/core$/, replacement: sourceOf('core', 'index') },
      { find: /^@ptpconf\/cli$/, replacement: sourceOf('cli', 'program') },
    ],
  },
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**', // ビルド成果物を除外（重複実行を防止）
    ],
    environment: 'node',
    reporters: ['default'],
  },
});
