import ts from 'typescript';
import { defineConfig } from 'vitest/config';

const isCI = process.env.CI === 'true';

export default defineConfig({
  // Transpile TypeScript with tsc instead of esbuild: esbuild renames shadowed
  // function expressions (fn -> fn2), and error messages rely on Function.name
  esbuild: false,
  plugins: [
    {
      name: 'objfuzz:tsc-transpile',
      enforce: 'pre',
      transform(code: string, id: string) {
        if (!/\.[cm]?ts$/.test(id.split('?')[0] ?? '')) return null;
        const out = ts.transpileModule(code, {
          fileName: id,
          compilerOptions: {
            target: ts.ScriptTarget.ES2022,
            module: ts.ModuleKind.ESNext,
            sourceMap: true,
          },
        });
        return {
          code: out.outputText.replace(/\n\/\/# sourceMappingURL=.*$/, ''),
          map: out.sourceMapText,
        };
      },
    },
  ],
  test: {
    name: 'randomizer',
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts', 'test/**/*.spec.ts'],
    // No retries - surface issues immediately
    retry: 0,
    // Property-based suites run thousands of passes
    testTimeout: isCI ? 30000 : 10000,
  },
});
